import chalk from 'chalk';

/** Logging handle passed into every core component. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  /** Send everything to stderr (used when stdout carries JSON). */
  stderr?: boolean;
}

/** Console logger with chalk colouring; debug lines only when verbose. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const out = options.stderr ? console.error : console.log;
  return {
    debug(message) {
      if (options.verbose) out(chalk.dim(`  ${message}`));
    },
    info(message) {
      out(message);
    },
    warn(message) {
      console.error(chalk.yellow(`⚠ ${message}`));
    },
    error(message) {
      console.error(chalk.red(`✗ ${message}`));
    },
  };
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
