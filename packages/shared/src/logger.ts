export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Print packet traces and other debug lines. */
  verbose?: boolean;
  /** Drop everything, including errors. */
  silent?: boolean;
  prefix?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { verbose = false, silent = false, prefix } = options;
  const tag = (message: string): string => (prefix ? `[${prefix}] ${message}` : message);

  return {
    debug(message) {
      if (!silent && verbose) console.log(tag(message));
    },
    info(message) {
      if (!silent) console.log(tag(message));
    },
    warn(message) {
      if (!silent) console.warn(tag(message));
    },
    error(message) {
      if (!silent) console.error(tag(message));
    },
  };
}

export const silentLogger: Logger = createLogger({ silent: true });
