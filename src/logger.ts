export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  /** Emit `debug` lines. */
  verbose?: boolean;
  /** Defaults to `process.stderr`. */
  stream?: { write(chunk: string): unknown };
}

/**
 * Writes `[xsd2owl] level: message` lines to stderr.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const write = (level: string, message: string): void => {
    stream.write(`[xsd2owl] ${level}: ${message}\n`);
  };
  return {
    debug: (message) => {
      if (options.verbose) write('debug', message);
    },
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
