export interface Logger {
  debug(message: string): void;
  error(message: string, err?: unknown): void;
}

/**
 * Console logger that prefixes every line with `component:`.
 * Writes to stderr so command output on stdout stays clean;
 * debug lines are dropped unless `verbose` is set.
 */
export function createLogger(component: string, verbose: boolean): Logger {
  const prefix = `${component}:`;
  return {
    debug: (message) => {
      if (verbose) console.error(prefix, message);
    },
    error: (message, err) => {
      if (err === undefined) {
        console.error(prefix, message);
      } else {
        console.error(prefix, message, err instanceof Error ? err.message : err);
      }
    },
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  error: () => undefined,
};
