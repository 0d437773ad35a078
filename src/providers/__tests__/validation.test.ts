import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { validateAnthropicKey, getAnthropicKey } from '../validation.js';
import { _clearEnvCache } from '../../config/env.js';
import { APIKeyError } from '../../errors/index.js';

describe('Anthropic key validation', () => {
  beforeEach(() => {
    _clearEnvCache();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    _clearEnvCache();
  });

  it('reports a missing key with setup instructions', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', '');

    const result = validateAnthropicKey();

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.error).toBe('ANTHROPIC_API_KEY environment variable is not set');
      expect(result.setupInstructions).toContain('ANTHROPIC_API_KEY');
    }
  });

  it('rejects a key with the wrong prefix without echoing it', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

    const result = validateAnthropicKey();

    expect(result).toEqual({
      valid: false,
      error: 'Invalid Anthropic API key format (should start with "sk-ant-")',
      setupInstructions: expect.any(String),
    });
    expect(JSON.stringify(result)).not.toContain('test-secret');
  });

  it('accepts a well-formed key', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'sk-ant-placeholder');

    expect(validateAnthropicKey()).toEqual({ valid: true });
    expect(getAnthropicKey()).toBe('sk-ant-placeholder');
  });

  it('throws APIKeyError when asked for an invalid key', () => {
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');

    expect(() => getAnthropicKey()).toThrow(APIKeyError);
  });
});
