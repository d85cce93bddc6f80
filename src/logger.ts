import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  write?: (line: string) => void;
}

function timestamp(): string {
  return chalk.gray(new Date().toISOString());
}

/**
 * Console logger writing to stderr, so stdout only ever carries the report.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.error(line));

  return {
    info(message) {
      write(`${timestamp()} ${message}`);
    },
    warn(message) {
      write(`${timestamp()} ${chalk.yellow(message)}`);
    },
    error(message) {
      write(`${timestamp()} ${chalk.red(message)}`);
    },
    debug(message) {
      if (options.verbose) {
        write(`${timestamp()} ${chalk.gray(message)}`);
      }
    },
  };
}

export const silentLogger: Logger = {
  info() {},
  warn() {},
  error() {},
  debug() {},
};
