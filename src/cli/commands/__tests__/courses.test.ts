/**
 * Courses and Outline Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';

import { createCoursesCommand } from '../courses.js';
import { createOutlineCommand } from '../outline.js';
import { formatOutline } from '../../../agent/tools/outline-tool.js';
import { CLIError } from '../../../errors/index.js';
import { openCourseStore } from '../../runtime.js';
import { createMockContext, createTestStore, SAMPLE_COURSE } from '../../../test-utils/index.js';

vi.mock('../../runtime.js', () => ({
  createCourseAssistant: vi.fn(),
  openCourseStore: vi.fn(),
  chunkingFromConfig: vi.fn(),
}));

vi.mock('../../../config/loader.js', async () => {
  const { DEFAULT_CONFIG: defaults } = await import('../../../config/defaults.js');
  return { loadConfig: vi.fn(() => defaults) };
});

let consoleLog: MockInstance<typeof console.log>;

beforeEach(() => {
  vi.clearAllMocks();
  consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('courses command', () => {
  it('lists courses with lesson and chunk counts as JSON', async () => {
    vi.mocked(openCourseStore).mockReturnValue(createTestStore());
    const { ctx } = createMockContext({ json: true });

    await createCoursesCommand(() => ctx).parseAsync([], { from: 'user' });

    expect(JSON.parse(String(consoleLog.mock.calls[0]?.[0]))).toEqual({
      count: 2,
      courses: [
        {
          title: 'Introduction to Retrieval',
          instructor: 'Ada Park',
          link: 'https://example.com/retrieval',
          lessonCount: 3,
          chunkCount: 3,
        },
        {
          title: 'Prompt Design Fundamentals',
          instructor: null,
          link: null,
          lessonCount: 0,
          chunkCount: 1,
        },
      ],
    });
  });

  it('prints a table and a total', async () => {
    vi.mocked(openCourseStore).mockReturnValue(createTestStore());
    const { ctx, logs } = createMockContext();

    await createCoursesCommand(() => ctx).parseAsync([], { from: 'user' });

    expect(logs[0]).toContain('Introduction to Retrieval');
    expect(logs[0]).toContain('Prompt Design Fundamentals');
    expect(logs[logs.length - 1]).toContain('2 courses indexed');
  });

  it('points at the index command when nothing is indexed', async () => {
    vi.mocked(openCourseStore).mockReturnValue(createTestStore({ seed: false }));
    const { ctx, logs } = createMockContext();

    await createCoursesCommand(() => ctx).parseAsync([], { from: 'user' });

    expect(logs[0]).toContain('No courses indexed yet.');
    expect(logs[logs.length - 1]).toContain('crag index ./docs');
  });
});

describe('outline command', () => {
  beforeEach(() => {
    vi.mocked(openCourseStore).mockReturnValue(createTestStore());
  });

  it('prints the outline of a course found by partial name', async () => {
    const { ctx, logs, debugs } = createMockContext();

    await createOutlineCommand(() => ctx).parseAsync(['retrieval'], { from: 'user' });

    expect(logs).toEqual([formatOutline(SAMPLE_COURSE)]);
    expect(debugs).toContain("Resolved 'retrieval' to 'Introduction to Retrieval'");
  });

  it('prints the course as JSON', async () => {
    const { ctx } = createMockContext({ json: true });

    await createOutlineCommand(() => ctx).parseAsync(['Introduction to Retrieval'], { from: 'user' });

    expect(JSON.parse(String(consoleLog.mock.calls[0]?.[0]))).toEqual(SAMPLE_COURSE);
  });

  it('fails on an unknown course', async () => {
    const { ctx } = createMockContext();

    await expect(createOutlineCommand(() => ctx).parseAsync(['zzz'], { from: 'user' })).rejects.toThrow(
      new CLIError("No course found matching 'zzz'")
    );
  });
});
