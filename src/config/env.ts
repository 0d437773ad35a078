/**
 * Environment Variable Handler
 *
 * Loads .env (via dotenv) and exposes typed access to the variables the
 * assistant reads. The API key is never logged or put into error messages;
 * only its presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op without a .env file
dotenvConfig();

export const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  /** Overrides the ~/.crag data directory */
  CRAG_HOME: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

let _envCache: EnvVars | null = null;

/**
 * Read the environment once and cache it. Empty strings count as unset.
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const blankToUndefined = (value: string | undefined): string | undefined =>
    value !== undefined && value.trim() !== '' ? value : undefined;

  _envCache = EnvSchema.parse({
    ANTHROPIC_API_KEY: blankToUndefined(process.env.ANTHROPIC_API_KEY),
    CRAG_HOME: blankToUndefined(process.env.CRAG_HOME),
  });

  return _envCache;
}

export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Whether an Anthropic API key is configured, without exposing it.
 */
export function hasApiKey(): boolean {
  return getEnv('ANTHROPIC_API_KEY') !== undefined;
}

/**
 * Clear the cached environment.
 *
 * @internal for tests
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

export const SETUP_INSTRUCTIONS = `
To answer questions the assistant needs an Anthropic API key:

1. Create a key at https://console.anthropic.com/
2. Export it, or put it in a .env file in the directory you run crag from:

   export ANTHROPIC_API_KEY="<your key>"
`.trim();
