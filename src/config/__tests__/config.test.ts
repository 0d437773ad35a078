/**
 * Config Module Tests
 *
 * Loading, validation, and merging against a temporary CRAG_HOME.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ConfigSchema, PartialConfigSchema } from '../schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from '../defaults.js';
import {
  loadConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  listConfig,
  deepMerge,
  parseValue,
} from '../loader.js';
import { getConfigPath, getDbPath } from '../paths.js';
import { _clearEnvCache } from '../env.js';
import { ConfigError } from '../../errors/index.js';

describe('Config Schema', () => {
  it('accepts the defaults', () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects more than 5 tool rounds', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      orchestrator: { ...DEFAULT_CONFIG.orchestrator, max_tool_rounds: 6 },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('rejects an overlap as large as the chunk', () => {
    const invalid = {
      ...DEFAULT_CONFIG,
      chunking: { chunk_size: 500, chunk_overlap: 500 },
    };
    expect(ConfigSchema.safeParse(invalid).success).toBe(false);
  });

  it('accepts sparse overrides', () => {
    expect(PartialConfigSchema.safeParse({ search: { max_results: 3 } }).success).toBe(true);
  });

  it('rejects unknown top-level keys', () => {
    expect(PartialConfigSchema.safeParse({ embedding: { model: 'x' } }).success).toBe(false);
  });
});

describe('deepMerge', () => {
  it('merges nested sections and keeps untouched defaults', () => {
    const merged = deepMerge(
      { generation: { max_tokens: 800, timeout_ms: 60000 }, model: 'a' },
      { generation: { max_tokens: 400 } }
    );

    expect(merged).toEqual({ generation: { max_tokens: 400, timeout_ms: 60000 }, model: 'a' });
  });

  it('ignores undefined overrides', () => {
    expect(deepMerge({ model: 'a' }, { model: undefined })).toEqual({ model: 'a' });
  });
});

describe('parseValue', () => {
  it('parses booleans, numbers and strings', () => {
    expect(parseValue('TRUE')).toBe(true);
    expect(parseValue('false')).toBe(false);
    expect(parseValue('3')).toBe(3);
    expect(parseValue('claude-test')).toBe('claude-test');
    expect(parseValue(' ')).toBe(' ');
  });
});

describe('Config loader', () => {
  let home: string;

  beforeEach(() => {
    home = fs.mkdtempSync(path.join(os.tmpdir(), 'crag-config-'));
    vi.stubEnv('CRAG_HOME', home);
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
    fs.rmSync(home, { recursive: true, force: true });
  });

  it('resolves paths under CRAG_HOME', () => {
    expect(getConfigPath()).toBe(path.join(home, 'config.toml'));
    expect(getDbPath()).toBe(path.join(home, 'courses.db'));
  });

  it('writes the template on first run and returns defaults', () => {
    const config = loadConfig();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(fs.readFileSync(getConfigPath(), 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('does not write anything when createIfMissing is false', () => {
    loadConfig(false);

    expect(fs.existsSync(getConfigPath())).toBe(false);
  });

  it('parses the template back to the defaults', () => {
    loadConfig();

    expect(loadConfig()).toEqual(DEFAULT_CONFIG);
  });

  it('merges user overrides over defaults', () => {
    fs.writeFileSync(getConfigPath(), '[orchestrator]\nmax_tool_rounds = 3\n');

    const config = loadConfig();

    expect(config.orchestrator).toEqual({ max_tool_rounds: 3, parallel_tool_calls: false });
    expect(config.search.max_results).toBe(5);
  });

  it('throws ConfigError on invalid TOML', () => {
    fs.writeFileSync(getConfigPath(), 'model = [unclosed');

    expect(() => loadConfig()).toThrow(ConfigError);
  });

  it('throws ConfigError when a merged value breaks a cross-field rule', () => {
    fs.writeFileSync(getConfigPath(), '[chunking]\nchunk_overlap = 900\n');

    expect(() => loadConfig()).toThrow(/chunk_overlap must be smaller than chunk_size/);
  });

  it('sets and reads back a nested value', () => {
    setConfigValue('search.max_results', '8');

    expect(getConfigValue('search.max_results')).toBe(8);
    expect(fs.readFileSync(getConfigPath(), 'utf-8')).toContain('max_results = 8');
  });

  it('rejects unknown keys', () => {
    expect(() => setConfigValue('search.rerank', 'true')).toThrow('Unknown config key: search.rerank');
    expect(() => setConfigValue('search', '1')).toThrow(ConfigError);
  });

  it('rejects values outside the schema and leaves the file alone', () => {
    setConfigValue('session.max_history', '4');

    expect(() => setConfigValue('orchestrator.max_tool_rounds', '9')).toThrow(ConfigError);
    expect(getConfigValue('orchestrator.max_tool_rounds')).toBe(2);
    expect(getConfigValue('session.max_history')).toBe(4);
  });

  it('lists flattened keys', () => {
    const entries = new Map(listConfig());

    expect(entries.get('model')).toBe(DEFAULT_CONFIG.model);
    expect(entries.get('chunking.chunk_overlap')).toBe(100);
    expect(entries.get('orchestrator.parallel_tool_calls')).toBe(false);
    expect(entries.has('generation')).toBe(false);
  });

  it('resets to the template', () => {
    setConfigValue('model', 'claude-test');

    resetConfig();

    expect(loadConfig().model).toBe(DEFAULT_CONFIG.model);
  });
});
