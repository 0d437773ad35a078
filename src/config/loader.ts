/**
 * Configuration Loader
 *
 * 1. Find or create the data directory (~/.crag or $CRAG_HOME)
 * 2. Parse config.toml when present
 * 3. Validate the sparse overrides, merge them over DEFAULT_CONFIG
 * 4. Validate the merged result (cross-field rules live there)
 */

import * as fs from 'node:fs';
import TOML from '@iarna/toml';
import { ConfigSchema, PartialConfigSchema, type Config } from './schema.js';
import { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';
import { getCragDir, getConfigPath } from './paths.js';
import { ConfigError } from '../errors/index.js';
import type { ZodIssue } from 'zod';

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function ensureCragDir(): void {
  fs.mkdirSync(getCragDir(), { recursive: true });
}

function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
}

/**
 * Deep merge where source values override target values. Arrays and
 * primitives are replaced, nested objects are merged.
 */
export function deepMerge(target: PlainObject, source: PlainObject): PlainObject {
  const result: PlainObject = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = target[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

function readConfigFile(configPath: string): PlainObject {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${configPath} or run: crag config reset`
    );
  }
}

/**
 * Load the effective configuration (defaults + user overrides).
 *
 * @param createIfMissing - write the commented template on first run
 * @throws {ConfigError} when config.toml exists but is invalid
 */
export function loadConfig(createIfMissing = true): Config {
  const configPath = getConfigPath();

  if (!fs.existsSync(configPath)) {
    if (createIfMissing) {
      ensureCragDir();
      fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
    }
    return structuredClone(DEFAULT_CONFIG);
  }

  const overrides = PartialConfigSchema.safeParse(readConfigFile(configPath));
  if (!overrides.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(overrides.error.issues)}`,
      'Run: crag config reset  to restore defaults'
    );
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, overrides.data));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid configuration:\n${formatIssues(merged.error.issues)}`,
      'Run: crag config reset  to restore defaults'
    );
  }

  return merged.data;
}

function lookup(root: unknown, key: string): unknown {
  let current = root;
  for (const part of key.split('.')) {
    if (!isPlainObject(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Get a config value by dot-notation path, e.g. `orchestrator.max_tool_rounds`.
 */
export function getConfigValue(key: string): unknown {
  return lookup(loadConfig(), key);
}

/**
 * Parse a CLI string into a boolean, number or string.
 */
export function parseValue(value: string): string | number | boolean {
  if (value.toLowerCase() === 'true') return true;
  if (value.toLowerCase() === 'false') return false;

  const num = Number(value);
  if (!Number.isNaN(num) && value.trim() !== '') return num;

  return value;
}

function toTomlMap(source: PlainObject): TOML.JsonMap {
  const map: TOML.JsonMap = {};
  for (const [key, value] of Object.entries(source)) {
    if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      map[key] = value;
    } else if (isPlainObject(value)) {
      map[key] = toTomlMap(value);
    }
  }
  return map;
}

/**
 * Set a config value by dot-notation path and write config.toml.
 * Only keys that exist in the defaults are accepted.
 *
 * @throws {ConfigError} for unknown keys or values the schema rejects
 */
export function setConfigValue(key: string, value: string): void {
  const defaultValue = lookup(DEFAULT_CONFIG, key);
  if (defaultValue === undefined || isPlainObject(defaultValue)) {
    throw new ConfigError(`Unknown config key: ${key}`);
  }

  const configPath = getConfigPath();
  ensureCragDir();

  const raw: PlainObject = fs.existsSync(configPath) ? readConfigFile(configPath) : {};

  const parts = key.split('.');
  const leaf = parts.pop();
  let section = raw;
  for (const part of parts) {
    const next = section[part];
    if (isPlainObject(next)) {
      section = next;
    } else {
      const created: PlainObject = {};
      section[part] = created;
      section = created;
    }
  }
  if (leaf !== undefined) {
    section[leaf] = parseValue(value);
  }

  const merged = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, raw));
  if (!merged.success) {
    throw new ConfigError(
      `Invalid value for '${key}':\n${formatIssues(merged.error.issues)}`,
      'Run: crag config list  to see current values and types'
    );
  }

  fs.writeFileSync(configPath, TOML.stringify(toTomlMap(raw)), 'utf-8');
}

/**
 * Overwrite config.toml with the default template.
 */
export function resetConfig(): string {
  ensureCragDir();
  const configPath = getConfigPath();
  fs.writeFileSync(configPath, CONFIG_TEMPLATE, 'utf-8');
  return configPath;
}

/**
 * Flatten the effective config into `[dotted.key, value]` pairs.
 */
export function listConfig(): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  const flatten = (obj: PlainObject, prefix: string): void => {
    for (const [key, value] of Object.entries(obj)) {
      const fullKey = prefix ? `${prefix}.${key}` : key;
      if (isPlainObject(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  };

  flatten(loadConfig(), '');
  return entries;
}
