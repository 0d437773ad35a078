/**
 * Tool registry errors (exit code 7)
 */

import { CLIError } from '../../errors/index.js';

/**
 * Two tools registered under one name. A programming error at startup.
 */
export class DuplicateToolError extends CLIError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool '${toolName}' is already registered`, 'Register each tool exactly once', 7);
    this.name = 'DuplicateToolError';
    this.toolName = toolName;
  }
}

/**
 * The model asked for a tool the registry doesn't have. The orchestrator
 * turns this into a tool result instead of failing the query.
 */
export class UnknownToolError extends CLIError {
  public readonly toolName: string;

  constructor(toolName: string) {
    super(`Tool '${toolName}' not found`, undefined, 7);
    this.name = 'UnknownToolError';
    this.toolName = toolName;
  }
}

/**
 * A tool's own logic threw. Aborts the whole query.
 */
export class ToolExecutionError extends CLIError {
  public readonly toolName: string;
  public readonly cause?: unknown;

  constructor(toolName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Tool '${toolName}' failed: ${reason}`, 'Check the course index with: crag courses', 7);
    this.name = 'ToolExecutionError';
    this.toolName = toolName;
    this.cause = cause;
  }
}
