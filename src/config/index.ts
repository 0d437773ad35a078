/**
 * Config Module
 *
 * Programmatic config access. CLI users go through `crag config`.
 */

export {
  ConfigSchema,
  PartialConfigSchema,
  GenerationConfigSchema,
  OrchestratorConfigSchema,
  SearchConfigSchema,
  ChunkingConfigSchema,
  SessionConfigSchema,
} from './schema.js';
export type { Config, PartialConfig } from './schema.js';

export { DEFAULT_CONFIG, CONFIG_TEMPLATE } from './defaults.js';

export {
  loadConfig,
  getConfigValue,
  setConfigValue,
  resetConfig,
  listConfig,
  deepMerge,
  parseValue,
} from './loader.js';

export { getCragDir, getDbPath, getConfigPath, DB_FILENAME, CONFIG_FILENAME } from './paths.js';

export { loadEnv, getEnv, hasApiKey, SETUP_INSTRUCTIONS, EnvSchema, _clearEnvCache } from './env.js';
export type { EnvVars } from './env.js';
