import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { isDepdotError, getErrorMessage, getErrorStack } from '@depdot/core';

/**
 * Spinner wrapper for CLI progress. Always draws on stderr: stdout
 * may be carrying the rendered document.
 */
export class TaskSpinner {
  private spinner: Ora;

  constructor(initialText: string) {
    this.spinner = ora({ text: initialText, stream: process.stderr }).start();
  }

  succeed(text: string): void {
    this.spinner.succeed(text);
  }

  fail(text: string): void {
    this.spinner.fail(text);
  }
}

/**
 * Handles command errors with consistent formatting
 * Distinguishes between depdot errors and unexpected errors
 *
 * @param verbose - show error context and stack traces
 */
export function handleCommandError(error: unknown, verbose: boolean = false): void {
  const errorMessage = getErrorMessage(error);

  if (isDepdotError(error)) {
    console.error(chalk.red(`\n❌ ${errorMessage}\n`));

    if (error.context && verbose) {
      console.error(chalk.dim('Context:'));
      console.error(chalk.dim(JSON.stringify(error.context, null, 2)));
    }
  } else {
    console.error(chalk.red(`\n❌ Unexpected error: ${errorMessage}\n`));

    const stack = getErrorStack(error);
    if (stack && verbose) {
      console.error(chalk.dim('Stack trace:'));
      console.error(chalk.dim(stack));
    }
  }

  if (!verbose) {
    console.error(chalk.dim('Run with --verbose for more details\n'));
  }
}

/**
 * Formats a duration in milliseconds to a human-readable string
 * (e.g., "1.5s", "123ms")
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}

/** "1 node", "5 nodes" */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
