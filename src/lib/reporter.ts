import chalk from 'chalk';

/**
 * Progress sink for services. Commands pass a console-backed reporter,
 * tests pass a recording one.
 */
export interface Reporter {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
}

export function createConsoleReporter(debugEnabled = process.env.WPDOCK_DEBUG === '1'): Reporter {
  return {
    debug(message) {
      if (debugEnabled) {
        console.log(chalk.gray(`[debug] ${message}`));
      }
    },
    info(message) {
      console.log(message);
    },
    success(message) {
      console.log(`${chalk.green('✓')} ${message}`);
    },
    warn(message) {
      console.warn(chalk.yellow(`Warning: ${message}`));
    },
  };
}

export const silentReporter: Reporter = {
  debug() {},
  info() {},
  success() {},
  warn() {},
};
