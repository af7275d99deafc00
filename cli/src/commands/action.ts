import chalk from 'chalk';
import { errorMessage } from '../core/errors.js';

/**
 * Wrap a command action: any error that escapes is printed in red on stderr
 * and the process exits 1.
 */
export function cliAction<A extends unknown[]>(
  fn: (...args: A) => Promise<void>,
): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exit(1);
    }
  };
}
