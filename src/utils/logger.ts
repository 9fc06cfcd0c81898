/** Structured logger accepted by the client; compatible with pino, winston or console wrappers. */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/** Logger that discards everything; the default. */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger writing to the console, each line prefixed with `[scope]`.
 */
export function createConsoleLogger(scope = 'pacedrest'): Logger {
  const prefix = `[${scope}]`;
  const write =
    (fn: (...args: unknown[]) => void) =>
    (message: string, data?: Record<string, unknown>): void => {
      if (data) {
        fn(prefix, message, data);
        return;
      }
      fn(prefix, message);
    };

  return {
    debug: write(console.debug),
    info: write(console.info),
    warn: write(console.warn),
    error: write(console.error),
  };
}
