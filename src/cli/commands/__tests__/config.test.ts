/**
 * Config Command Tests
 *
 * Runs against a temporary CRAG_HOME.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';

import { createConfigCommand, formatValue } from '../config.js';
import { CONFIG_TEMPLATE } from '../../../config/defaults.js';
import { _clearEnvCache } from '../../../config/env.js';
import { ConfigError } from '../../../errors/index.js';
import { createMockContext } from '../../../test-utils/index.js';

describe('config command', () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'crag-config-cmd-'));
    vi.stubEnv('CRAG_HOME', home);
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
    fs.rmSync(home, { recursive: true, force: true });
  });

  async function run(args: string[]) {
    const mock = createMockContext();
    await createConfigCommand(() => mock.ctx).parseAsync(args, { from: 'user' });
    return mock;
  }

  it('gets a default value', async () => {
    const { logs } = await run(['get', 'search.max_results']);
    expect(logs).toEqual(['5']);
  });

  it('sets a value that later reads back', async () => {
    const { logs } = await run(['set', 'search.max_results', '8']);
    expect(logs[0]).toContain('search.max_results');

    const { logs: after } = await run(['get', 'search.max_results']);
    expect(after).toEqual(['8']);
  });

  it('rejects an unknown key', async () => {
    await expect(run(['get', 'search.nope'])).rejects.toThrow(new ConfigError('Unknown config key: search.nope'));
  });

  it('rejects a value outside the schema', async () => {
    await expect(run(['set', 'orchestrator.max_tool_rounds', '9'])).rejects.toBeInstanceOf(ConfigError);
  });

  it('prints the config file location', async () => {
    const { logs } = await run(['path']);
    expect(logs).toEqual([path.join(home, 'config.toml')]);
  });

  it('resets to the template with --force', async () => {
    await run(['set', 'search.max_results', '8']);

    const { logs } = await run(['reset', '--force']);

    expect(logs[0]).toContain('Configuration reset to defaults');
    expect(fs.readFileSync(path.join(home, 'config.toml'), 'utf-8')).toBe(CONFIG_TEMPLATE);
  });
});

describe('formatValue', () => {
  it('renders scalars plainly', () => {
    expect(formatValue('claude')).toBe('claude');
    expect(formatValue(false)).toBe('false');
    expect(formatValue(800)).toBe('800');
  });
});
