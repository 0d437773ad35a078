/**
 * Tests for the CLIError hierarchy and the error formatter
 */

import { describe, it, expect, vi, beforeAll } from 'vitest';
import chalk from 'chalk';
import {
  CLIError,
  FileNotFoundError,
  ConfigError,
  APIKeyError,
  DatabaseError,
  ValidationError,
  formatError,
  getExitCode,
  handleError,
} from '../index.js';

beforeAll(() => {
  // Plain output so assertions can match exact strings
  chalk.level = 0;
});

describe('Error Classes', () => {
  it('CLIError defaults to exit code 1 and no hint', () => {
    const error = new CLIError('Something went wrong');

    expect(error.message).toBe('Something went wrong');
    expect(error.hint).toBeUndefined();
    expect(error.code).toBe(1);
    expect(error.name).toBe('CLIError');
    expect(error).toBeInstanceOf(Error);
  });

  it('FileNotFoundError names the missing path', () => {
    const error = new FileNotFoundError('/courses/missing.txt');

    expect(error.message).toBe('Path does not exist: /courses/missing.txt');
    expect(error.code).toBe(3);
    expect(error).toBeInstanceOf(CLIError);
  });

  it('ConfigError falls back to the config list hint', () => {
    const error = new ConfigError('Unknown key: foo');

    expect(error.hint).toBe('Run: crag config list  to see valid options');
    expect(error.code).toBe(2);
  });

  it('APIKeyError derives the env var from the provider name', () => {
    const error = new APIKeyError('anthropic');

    expect(error.message).toBe('anthropic API key not configured');
    expect(error.hint).toContain('ANTHROPIC_API_KEY');
    expect(error.code).toBe(4);
  });

  it('DatabaseError keeps the underlying error', () => {
    const cause = new Error('SQLITE_BUSY');
    const error = new DatabaseError('Failed to write chunks', cause);

    expect(error.cause).toBe(cause);
    expect(error.code).toBe(5);
  });

  it('ValidationError lists issues in the hint', () => {
    const error = new ValidationError('Bad input', ['lesson must be >= 0', 'query is empty']);

    expect(error.issues).toEqual(['lesson must be >= 0', 'query is empty']);
    expect(error.hint).toBe('Issues:\n  lesson must be >= 0\n  query is empty');
  });
});

describe('formatError', () => {
  it('renders message and hint as text', () => {
    const output = formatError(new CLIError('Broken', 'Fix it'));

    expect(output).toBe('Error: Broken\nHint: Fix it');
  });

  it('shows the cause only in verbose mode', () => {
    const error = new DatabaseError('Write failed', new Error('disk full'));

    expect(formatError(error)).not.toContain('Cause:');
    expect(formatError(error, { verbose: true })).toContain('Cause: disk full');
  });

  it('renders JSON with code and hint', () => {
    const output = formatError(new ConfigError('Bad value', 'Use a number'), { json: true });

    expect(JSON.parse(output)).toEqual({
      error: 'Bad value',
      code: 2,
      hint: 'Use a number',
    });
  });

  it('suggests --verbose for plain errors', () => {
    const output = formatError(new Error('boom'));

    expect(output).toBe('Error: boom\nHint: Run with --verbose for more details');
  });

  it('stringifies non-errors', () => {
    expect(formatError('oops')).toBe('Error: oops');
    expect(JSON.parse(formatError(42, { json: true }))).toEqual({ error: '42', code: 1 });
  });
});

describe('getExitCode', () => {
  it('uses the CLIError code', () => {
    expect(getExitCode(new FileNotFoundError('/x'))).toBe(3);
  });

  it('returns 1 for anything else', () => {
    expect(getExitCode(new Error('x'))).toBe(1);
    expect(getExitCode(undefined)).toBe(1);
  });
});

describe('handleError', () => {
  it('prints once and exits with the error code', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {
      throw new Error('exit called');
    }) as () => never);

    expect(() => handleError(new APIKeyError('anthropic'))).toThrow('exit called');
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(exitSpy).toHaveBeenCalledWith(4);

    errorSpy.mockRestore();
    exitSpy.mockRestore();
  });
});
