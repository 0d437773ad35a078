/**
 * API Key Validation
 *
 * Checks the Anthropic key's presence and shape without ever returning it
 * in a message.
 */

import { z } from 'zod';
import { getEnv, SETUP_INSTRUCTIONS } from '../config/env.js';
import { APIKeyError } from '../errors/index.js';

export type ValidationResult =
  | { valid: true }
  | { valid: false; error: string; setupInstructions: string };

/** Only the stable prefix is checked; key formats have changed over time */
export const AnthropicKeySchema = z
  .string()
  .min(1, 'API key cannot be empty')
  .refine((key) => key.startsWith('sk-ant-'), 'Invalid Anthropic API key format (should start with "sk-ant-")');

export function validateAnthropicKey(): ValidationResult {
  const key = getEnv('ANTHROPIC_API_KEY');
  if (key === undefined) {
    return {
      valid: false,
      error: 'ANTHROPIC_API_KEY environment variable is not set',
      setupInstructions: SETUP_INSTRUCTIONS,
    };
  }

  const result = AnthropicKeySchema.safeParse(key.trim());
  if (!result.success) {
    return {
      valid: false,
      error: result.error.issues[0]?.message ?? 'Invalid API key format',
      setupInstructions: SETUP_INSTRUCTIONS,
    };
  }

  return { valid: true };
}

/**
 * The key itself, for handing to the API client only.
 *
 * @throws {APIKeyError} when the key is missing or malformed
 */
export function getAnthropicKey(): string {
  const key = getEnv('ANTHROPIC_API_KEY');
  if (key === undefined || !validateAnthropicKey().valid) {
    throw new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY');
  }
  return key.trim();
}
