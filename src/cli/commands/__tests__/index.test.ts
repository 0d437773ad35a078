/**
 * Index Command Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

import { createIndexCommand } from '../index.js';
import { CLIError } from '../../../errors/index.js';
import type { CourseStore } from '../../../search/course-store.js';
import { openCourseStore } from '../../runtime.js';
import { createMockContext, createTestStore, SAMPLE_DOCUMENT } from '../../../test-utils/index.js';

vi.mock('../../runtime.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../runtime.js')>()),
  openCourseStore: vi.fn(),
}));

vi.mock('../../../config/loader.js', async () => {
  const { DEFAULT_CONFIG: defaults } = await import('../../../config/defaults.js');
  return { loadConfig: vi.fn(() => defaults) };
});

describe('index command', () => {
  let folder: string;
  let store: CourseStore;
  let consoleLog: MockInstance<typeof console.log>;

  beforeEach(() => {
    vi.clearAllMocks();
    folder = mkdtempSync(join(tmpdir(), 'crag-index-'));
    writeFileSync(join(folder, 'retrieval.txt'), SAMPLE_DOCUMENT);
    store = createTestStore({ seed: false });
    vi.mocked(openCourseStore).mockReturnValue(store);
    consoleLog = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(folder, { recursive: true, force: true });
  });

  async function run(args: string[], json = false) {
    const mock = createMockContext({ json });
    await createIndexCommand(() => mock.ctx).parseAsync(args, { from: 'user' });
    return mock;
  }

  it('indexes every course document in the folder', async () => {
    const { logs } = await run([folder]);

    expect(store.getCourseTitles()).toEqual(['Retrieval Basics']);
    expect(logs[0]).toContain('Added 1 course');
    expect(logs[logs.length - 1]).toContain('1 course indexed in total');
  });

  it('skips courses that are already indexed', async () => {
    await run([folder]);
    consoleLog.mockClear();

    await run([folder], true);

    expect(JSON.parse(String(consoleLog.mock.calls[0]?.[0]))).toEqual({
      folder,
      coursesAdded: 0,
      chunksAdded: 0,
      skipped: ['Retrieval Basics'],
      errors: [],
    });
  });

  it('re-indexes from scratch with --clear', async () => {
    await run([folder]);

    const { logs } = await run([folder, '--clear']);

    expect(logs[0]).toContain('Added 1 course');
    expect(store.getCourseCount()).toBe(1);
  });

  it('fails with exit code 3 for a missing folder', async () => {
    await expect(run([join(folder, 'missing')])).rejects.toMatchObject({ code: 3 });
    expect(openCourseStore).not.toHaveBeenCalled();
  });

  it('refuses a single file', async () => {
    await expect(run([join(folder, 'retrieval.txt')])).rejects.toThrow(
      new CLIError(`Path is not a directory: ${join(folder, 'retrieval.txt')}`)
    );
  });
});
