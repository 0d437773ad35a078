/**
 * Logger interface for library code
 *
 * Library modules (store, orchestrator, ingestion) accept a Logger instead of
 * writing to the console. The CLI passes its CommandContext, which satisfies
 * this interface; tests pass `silentLogger` or a `vi.fn()` backed object.
 */

export interface Logger {
  warn: (message: string) => void;
  /** Optional: only verbose contexts print debug lines */
  debug?: (message: string) => void;
}

export const consoleLogger: Logger = {
  warn: (message: string) => console.warn(message),
  debug: (message: string) => console.log(message),
};

export const silentLogger: Logger = {
  warn: () => undefined,
  debug: () => undefined,
};

/**
 * Wrap a logger so every line starts with `[scope]`.
 */
export function scopedLogger(logger: Logger, scope: string): Logger {
  const { debug } = logger;
  return {
    warn: (message: string) => logger.warn(`[${scope}] ${message}`),
    debug: debug ? (message: string) => debug(`[${scope}] ${message}`) : undefined,
  };
}
