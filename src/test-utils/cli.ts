/**
 * Command context that records output instead of printing it.
 */

import type { CommandContext, GlobalOptions } from '../cli/types.js';

export interface MockContext {
  ctx: CommandContext;
  logs: string[];
  debugs: string[];
  warnings: string[];
  errors: string[];
}

export function createMockContext(options: Partial<GlobalOptions> = {}): MockContext {
  const logs: string[] = [];
  const debugs: string[] = [];
  const warnings: string[] = [];
  const errors: string[] = [];

  const ctx: CommandContext = {
    options: { verbose: false, json: false, ...options },
    log: (message) => logs.push(message),
    debug: (message) => debugs.push(message),
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  };

  return { ctx, logs, debugs, warnings, errors };
}
