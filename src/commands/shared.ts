import { InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { errorMessage } from '../core/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

export interface OutputOptions {
  json?: boolean;
  verbose?: boolean;
}

/** Commander argument parser for positive integers. */
export function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`expected a positive integer, got "${value}"`);
  }
  return n;
}

/** Commander argument parser for integers ≥ 0. */
export function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new InvalidArgumentError(`expected a non-negative integer, got "${value}"`);
  }
  return n;
}

/** Logs go to stderr when stdout carries JSON. */
export function commandLogger(opts: OutputOptions): Logger {
  return createLogger({ verbose: opts.verbose, stderr: opts.json });
}

/**
 * AbortSignal fired by the first Ctrl-C, so in-flight work can stop and the
 * run can record where it got to. A second Ctrl-C exits immediately.
 */
export function interruptSignal(logger: Logger): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    logger.warn('Interrupted; finishing up (press Ctrl-C again to quit)');
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });
  return controller.signal;
}

/** Run a command body, printing failures in red and setting a non-zero exit code. */
export async function runCommand(body: () => Promise<number | void>): Promise<void> {
  try {
    const code = await body();
    if (code) process.exitCode = code;
  } catch (err) {
    console.error(chalk.red(errorMessage(err)));
    process.exitCode = 1;
  }
}
