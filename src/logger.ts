import type { Logger } from './types.js';

/**
 * Default logger that uses console.
 */
const defaultLogger: Logger = {
  debug: (message: string) => console.debug(message),
  info: (message: string) => console.info(message),
  warn: (message: string) => console.warn(message),
  error: (message: string) => console.error(message),
};

const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Gets the logger named by parser settings: console when unset, nothing when
 * `false`.
 */
export function getLogger(logger: Logger | false | undefined): Logger {
  if (logger === false) {
    return noopLogger;
  }

  return logger ?? defaultLogger;
}

/**
 * Wraps a logger so debug/info only pass through when verbose is enabled.
 * Warn and error are always logged.
 */
export function createVerboseLogger(logger: Logger, verbose: boolean = false): Logger {
  if (verbose) {
    return logger;
  }

  return {
    debug: () => {},
    info: () => {},
    warn: (msg) => logger.warn(msg),
    error: (msg) => logger.error(msg),
  };
}

/**
 * Resolves the logger a pipeline run narrates through.
 */
export function resolveLogger(settings: { logger?: Logger | false; verbose?: boolean }): Logger {
  return createVerboseLogger(getLogger(settings.logger), settings.verbose);
}
