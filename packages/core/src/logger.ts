/**
 * Logger interface shared by the parser, the builder and the CLI.
 * Keeps the core free of any particular output channel.
 */
export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/** Discards everything. Default for library calls that take an optional logger. */
export const silentLogger: Logger = {
  info: () => {},
  warning: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Logger that writes every level to stderr so stdout stays clean
 * for the rendered document. Debug lines are dropped unless `verbose`.
 */
export function createStderrLogger(
  options: { verbose?: boolean; stream?: { write(chunk: string): unknown } } = {},
): Logger {
  const stream = options.stream ?? process.stderr;
  const log = (level: string, message: string) => stream.write(`[${level}] ${message}\n`);

  return {
    info: message => log('info', message),
    warning: message => log('warning', message),
    error: message => log('error', message),
    debug: message => {
      if (options.verbose) log('debug', message);
    },
  };
}
