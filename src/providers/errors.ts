/**
 * Generation backend errors (exit code 8)
 */

import { CLIError } from '../errors/index.js';

export class GenerationAdapterError extends CLIError {
  /** HTTP status when the backend answered with one */
  public readonly status?: number;
  public readonly cause?: unknown;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, 'Check your network connection and ANTHROPIC_API_KEY, then try again', 8);
    this.name = 'GenerationAdapterError';
    this.status = options.status;
    this.cause = options.cause;
  }
}

export class GenerationTimeoutError extends CLIError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(
      `Generation call timed out after ${timeoutMs}ms`,
      'Raise the deadline with: crag config set generation.timeout_ms <ms>',
      8
    );
    this.name = 'GenerationTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}
