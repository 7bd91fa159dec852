/**
 * Console-backed logger
 *
 * Lines are tagged `[docredact]` or `[docredact:<component>]`. Callers pass
 * labels and offsets only; never original text or secrets.
 */

export const LOG_PREFIX = "[docredact]";

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
  debug?: (message: string) => void;
};

export function createLogger(component?: string): Logger {
  const prefix = component ? `[docredact:${component}]` : LOG_PREFIX;
  const logger: Logger = {
    info: (message) => console.log(`${prefix} ${message}`),
    warn: (message) => console.warn(`${prefix} ${message}`),
    error: (message) => console.error(`${prefix} ${message}`),
  };
  if (process.env.DOCREDACT_DEBUG) {
    logger.debug = (message) => console.debug(`${prefix} ${message}`);
  }
  return logger;
}

/** Logger that drops everything; the default for library calls. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger that records lines in memory, for assertions in tests and for the
 * CLI's report of warnings.
 */
export function createMemoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`info ${message}`),
    warn: (message) => lines.push(`warn ${message}`),
    error: (message) => lines.push(`error ${message}`),
    debug: (message) => lines.push(`debug ${message}`),
  };
}
