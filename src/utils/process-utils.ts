import chalk from 'chalk';
import { UI_CONSTANTS } from '../constants/ui.js';

/**
 * Exits the process with a delay so pending output is flushed
 * @param exitCode - Exit code (0 for success, 1 for error)
 */
export const exitProcess = (exitCode: number = 0): void => {
  setTimeout(() => process.exit(exitCode), UI_CONSTANTS.EXIT_DELAY_MS);
};

/**
 * Handles errors with immediate process exit (no delay)
 * @param error - The error to handle
 * @param context - Optional context for the error
 */
export const handleErrorImmediate = (error: unknown, context?: string): void => {
  const errorMessage = context ? `${context}: ${error}` : `Error: ${error}`;
  console.error(chalk.red(errorMessage));
  process.exit(1);
};
