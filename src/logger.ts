/**
 * Console logger
 *
 * Everything goes to stderr so the MCP server can keep stdout for the
 * protocol stream. Debug lines only appear in verbose mode.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Swallow everything, used by tests and the MCP server's quiet mode */
  silent?: boolean;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const write = (level: string, message: string) => {
    if (options.silent) return;
    process.stderr.write(`[${level}] [${scope}] ${message}\n`);
  };

  return {
    debug(message) {
      if (options.verbose) write('DEBUG', message);
    },
    info(message) {
      write('INFO', message);
    },
    warn(message) {
      write('WARN', message);
    },
    error(message) {
      write('ERROR', message);
    },
    child(childScope) {
      return createLogger(`${scope}:${childScope}`, options);
    },
  };
}

export const silentLogger: Logger = createLogger('silent', { silent: true });
