export type Logger = Pick<typeof console, "log" | "warn" | "error">;

/**
 * Timestamped console logger. Informational output is only printed in
 * verbose mode; warnings and errors always are.
 */
export function consoleLogger(verbose: boolean): Logger {
  return {
    log(...params: unknown[]) {
      if (verbose) {
        console.log(`[${new Date().toISOString()}]`, ...params);
      }
    },
    warn(...params: unknown[]) {
      console.warn(`[${new Date().toISOString()}]`, ...params);
    },
    error(...params: unknown[]) {
      console.error(`[${new Date().toISOString()}]`, ...params);
    },
  };
}
