/**
 * Ask Command Tests
 *
 * The assistant is real; its generation client is scripted and its store
 * lives in memory.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

import { createAskCommand } from '../ask.js';
import { CourseAssistant } from '../../../agent/course-assistant.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { APIKeyError, ValidationError } from '../../../errors/index.js';
import { createCourseAssistant } from '../../runtime.js';
import {
  createMockContext,
  createTestStore,
  scriptedClient,
  textResponse,
  toolUseResponse,
} from '../../../test-utils/index.js';
import type { GenerationResponse } from '../../../providers/types.js';

vi.mock('../../runtime.js', () => ({
  createCourseAssistant: vi.fn(),
  openCourseStore: vi.fn(),
  chunkingFromConfig: vi.fn(),
}));

vi.mock('../../../config/loader.js', async () => {
  const { DEFAULT_CONFIG: defaults } = await import('../../../config/defaults.js');
  return { loadConfig: vi.fn(() => defaults) };
});

function useAssistant(responses: GenerationResponse[]) {
  const scripted = scriptedClient(responses);
  vi.mocked(createCourseAssistant).mockReturnValue(
    new CourseAssistant({ store: createTestStore(), client: scripted.client })
  );
  return scripted;
}

const searchRetrieval = toolUseResponse({ id: 'tu_1', name: 'search_course_content', input: { query: 'retrieval' } });

describe('ask command', () => {
  let consoleLog: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.clearAllMocks();
    consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the answer followed by its sources', async () => {
    useAssistant([searchRetrieval, textResponse('Retrieval finds passages.')]);
    const { ctx, logs } = createMockContext();

    await createAskCommand(() => ctx).parseAsync(['What is retrieval?'], { from: 'user' });

    expect(logs[0]).toBe('Retrieval finds passages.');
    expect(logs).toContain('[1] Introduction to Retrieval - Lesson 1 (https://example.com/retrieval/1)');
  });

  it('prints no sources section when the model answered directly', async () => {
    useAssistant([textResponse('Hello.')]);
    const { ctx, logs } = createMockContext();

    await createAskCommand(() => ctx).parseAsync(['Hi there'], { from: 'user' });

    expect(logs).toEqual(['Hello.']);
  });

  it('sends the trimmed question to the model', async () => {
    const { requests } = useAssistant([textResponse('Hello.')]);
    const { ctx } = createMockContext();

    await createAskCommand(() => ctx).parseAsync(['   Who teaches retrieval?  '], { from: 'user' });

    expect(requests[0]?.messages).toEqual([
      { role: 'user', content: 'Answer this question about course materials: Who teaches retrieval?' },
    ]);
  });

  it('writes one JSON document under --json', async () => {
    useAssistant([searchRetrieval, textResponse('Retrieval finds passages.')]);
    const { ctx, logs } = createMockContext({ json: true });

    await createAskCommand(() => ctx).parseAsync(['What is retrieval?'], { from: 'user' });

    expect(logs).toEqual([]);
    expect(consoleLog).toHaveBeenCalledTimes(1);
    const output: unknown = JSON.parse(String(consoleLog.mock.calls[0]?.[0]));
    expect(output).toEqual({
      question: 'What is retrieval?',
      answer: 'Retrieval finds passages.',
      sources: [{ text: 'Introduction to Retrieval - Lesson 1', link: 'https://example.com/retrieval/1' }],
      metadata: { model: DEFAULT_CONFIG.model, totalMs: expect.any(Number) },
    });
  });

  it('rejects a blank question before building the assistant', async () => {
    const { ctx } = createMockContext();

    await expect(createAskCommand(() => ctx).parseAsync(['   '], { from: 'user' })).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(createCourseAssistant).not.toHaveBeenCalled();
  });

  it('lets a missing API key surface as APIKeyError', async () => {
    vi.mocked(createCourseAssistant).mockImplementation(() => {
      throw new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY');
    });
    const { ctx, logs } = createMockContext();

    await expect(createAskCommand(() => ctx).parseAsync(['What is retrieval?'], { from: 'user' })).rejects.toMatchObject({
      code: 4,
    });
    expect(logs).toEqual([]);
  });
});
