/**
 * Logging - scoped console output, debug lines only when verbose
 */

import chalk from 'chalk';

let verbose = process.env.DISPOSE_GUARD_DEBUG === '1';

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = chalk.dim(`[${scope}]`);

  return {
    debug(message: string): void {
      if (verbose) {
        console.error(`${prefix} ${chalk.gray(message)}`);
      }
    },
    info(message: string): void {
      console.log(`${prefix} ${message}`);
    },
    warn(message: string): void {
      console.warn(`${prefix} ${chalk.yellow(message)}`);
    },
    error(message: string): void {
      console.error(`${prefix} ${chalk.red(message)}`);
    },
  };
}
