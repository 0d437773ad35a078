/**
 * E2E Workflow Tests
 *
 * The whole journey against a temporary CRAG_HOME:
 * index → courses → search → ask → follow-up in the same session.
 *
 * Mocking strategy:
 * - Paths: CRAG_HOME points at a temp directory
 * - Database: real SQLite file under that directory
 * - LLM: scripted responses
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { vi, describe, it, expect, beforeAll, afterAll, beforeEach, afterEach, type MockInstance } from 'vitest';

import { CourseAssistant } from '../../agent/course-assistant.js';
import { createCoursesCommand } from '../../cli/commands/courses.js';
import { createIndexCommand } from '../../cli/commands/index.js';
import { createSearchCommand } from '../../cli/commands/search.js';
import { createCourseAssistant, openCourseStore } from '../../cli/runtime.js';
import { loadConfig } from '../../config/loader.js';
import { getDbPath } from '../../config/paths.js';
import { _clearEnvCache } from '../../config/env.js';
import { APIKeyError } from '../../errors/index.js';
import { silentLogger } from '../../utils/logger.js';
import {
  createMockContext,
  resetAll,
  scriptedClient,
  textResponse,
  toolUseResponse,
} from '../../test-utils/index.js';

const PROMPTS_DOCUMENT = `Course Title: Prompt Design Fundamentals
Course Link: https://example.com/prompts
Course Instructor: Lee Chen

Lesson 1: System Prompts
Lesson Link: https://example.com/prompts/1
A system prompt sets the rules for every answer the model gives.

Lesson 2: Few-Shot Examples
Examples inside the prompt show the model the expected format.
`;

const RETRIEVAL_DOCUMENT = `Course Title: Retrieval Basics
Course Link: https://example.com/retrieval
Course Instructor: Ada Park

Lesson 1: Chunking
Lesson Link: https://example.com/retrieval/1
Chunking splits long transcripts into overlapping passages.
`;

describe('E2E workflow', () => {
  let home: string;
  let docs: string;
  let consoleLog: MockInstance<typeof console.log>;

  beforeAll(() => {
    home = mkdtempSync(join(tmpdir(), 'crag-e2e-'));
    docs = join(home, 'docs');
    mkdirSync(docs);
    writeFileSync(join(docs, 'prompts.txt'), PROMPTS_DOCUMENT);
    writeFileSync(join(docs, 'retrieval.txt'), RETRIEVAL_DOCUMENT);
  });

  afterAll(() => {
    rmSync(home, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.stubEnv('CRAG_HOME', home);
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-placeholder');
    _clearEnvCache();
    consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    resetAll();
  });

  function lastJson(): unknown {
    return JSON.parse(String(consoleLog.mock.calls[consoleLog.mock.calls.length - 1]?.[0]));
  }

  it('indexes a folder into the database under CRAG_HOME', async () => {
    const { ctx } = createMockContext({ json: true });

    await createIndexCommand(() => ctx).parseAsync([docs], { from: 'user' });

    expect(lastJson()).toMatchObject({ folder: docs, coursesAdded: 2, skipped: [], errors: [] });
    expect(getDbPath()).toBe(join(home, 'courses.db'));
  });

  it('lists the indexed courses', async () => {
    const { ctx } = createMockContext({ json: true });

    await createCoursesCommand(() => ctx).parseAsync([], { from: 'user' });

    expect(lastJson()).toMatchObject({
      count: 2,
      courses: [{ title: 'Prompt Design Fundamentals' }, { title: 'Retrieval Basics' }],
    });
  });

  it('finds content with a course filter', async () => {
    const { ctx } = createMockContext({ json: true });

    await createSearchCommand(() => ctx).parseAsync(['passages', '-c', 'retrieval'], { from: 'user' });

    expect(lastJson()).toMatchObject({
      query: 'passages',
      count: 1,
      results: [{ courseTitle: 'Retrieval Basics', lessonNumber: 1 }],
    });
  });

  it('answers with sources and remembers the session', async () => {
    const { client, requests } = scriptedClient([
      toolUseResponse({ id: 'tu_1', name: 'search_course_content', input: { query: 'rules', course_name: 'prompt' } }),
      textResponse('A system prompt sets the rules.'),
      toolUseResponse({ id: 'tu_2', name: 'get_course_outline', input: { course_name: 'Prompt Design' } }),
      textResponse('It has two lessons.'),
    ]);
    const assistant = new CourseAssistant({ store: openCourseStore(loadConfig(), silentLogger), client });
    const session = assistant.createSession();

    const first = await assistant.query('What is a system prompt?', session);
    expect(first).toEqual({
      answer: 'A system prompt sets the rules.',
      sources: [{ text: 'Prompt Design Fundamentals - Lesson 1', link: 'https://example.com/prompts/1' }],
    });

    const second = await assistant.query('How many lessons does that course have?', session);
    expect(second).toEqual({ answer: 'It has two lessons.', sources: [] });
    expect(requests[2]?.system).toContain('User: What is a system prompt?');
  });

  it('builds the assistant from config when a key is present', () => {
    const assistant = createCourseAssistant(loadConfig(), silentLogger);
    expect(assistant.getCourseAnalytics()).toEqual({
      totalCourses: 2,
      courseTitles: ['Prompt Design Fundamentals', 'Retrieval Basics'],
    });
  });

  it('refuses to build the assistant without a key', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');
    _clearEnvCache();

    expect(() => createCourseAssistant(loadConfig(), silentLogger)).toThrow(APIKeyError);
  });
});
