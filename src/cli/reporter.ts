/**
 * Progress output for CLI workflows
 * Spinners go to stderr; results go to stdout so they can be piped
 */

import chalk from 'chalk';
import ora from 'ora';

export interface Reporter {
  /**
   * Run a step behind a spinner
   * @param done - Success text, derived from the step's result
   */
  task<T>(text: string, fn: () => Promise<T>, done?: (result: T) => string): Promise<T>;

  /**
   * Informational line
   */
  note(message: string): void;

  /**
   * Machine-readable output (handles, URLs, JSON)
   */
  result(message: string): void;
}

export function createConsoleReporter(): Reporter {
  return {
    async task<T>(text: string, fn: () => Promise<T>, done?: (result: T) => string): Promise<T> {
      const spinner = ora(text).start();
      try {
        const result = await fn();
        spinner.succeed(done ? done(result) : text);
        return result;
      } catch (error) {
        spinner.fail(text);
        throw error;
      }
    },

    note(message: string): void {
      process.stderr.write(chalk.cyan(message) + '\n');
    },

    result(message: string): void {
      console.log(message);
    },
  };
}
