/**
 * Error type definitions for the course assistant
 *
 * Every error the application raises on purpose extends CLIError, which carries:
 * - a recovery hint shown under the message
 * - an exit code so scripts can tell failures apart
 *
 * Exit codes:
 *   1  general / validation
 *   2  configuration
 *   3  file not found
 *   4  API key
 *   5  database
 *   7  tool registry / tool execution
 *   8  generation backend
 */

/**
 * Base class for all application errors.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Keeps `instanceof` working for subclasses after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a course document or folder doesn't exist.
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration problems: bad TOML, unknown keys, values out of range.
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: crag config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when the generation backend's API key is missing or malformed.
 */
export class APIKeyError extends CLIError {
  constructor(provider: string, envVar?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (a .env file in the working directory works too)`,
      4
    );
    this.name = 'APIKeyError';
  }
}

/**
 * Wraps SQLite failures from the course store.
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try running: crag courses  to check the course index', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when user input fails validation (CLI arguments, zod-parsed values).
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}
