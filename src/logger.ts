// src/logger.ts
// Console output for the CLI, coloured with chalk. Modules take a Logger so tests
// can capture or silence it.

import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  verbose(message: string): void;
}

export function createConsoleLogger(verbose = false): Logger {
  return {
    info: (message) => console.log(chalk.cyan(message)),
    success: (message) => console.log(chalk.green(message)),
    warn: (message) => console.warn(chalk.yellow(message)),
    error: (message, error) => {
      if (error === undefined) {
        console.error(chalk.red(message));
      } else {
        console.error(chalk.red(message), error instanceof Error ? error.message : error);
      }
    },
    verbose: (message) => {
      if (verbose) console.log(chalk.gray(message));
    },
  };
}

export const silentLogger: Logger = {
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  verbose: () => undefined,
};
