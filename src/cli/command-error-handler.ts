import chalk from 'chalk';
import {
  CommandFailedError,
  ManifestError,
  MatrixFailedError,
  RuntimeInterruptedError,
  UnknownChannelError,
  UnknownPhaseError,
} from '../errors.js';
import { ConfigLoadError } from '../config/loader.js';

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof RuntimeInterruptedError) {
    console.error(chalk.yellow(err.message));
    process.exit(err.exitCode);
  } else if (err instanceof CommandFailedError) {
    console.error(chalk.red(`Error: ${err.message}`));
    process.exit(err.exitCode);
  } else if (err instanceof MatrixFailedError) {
    console.error(chalk.red(`Error: ${err.message}`));
    process.exit(err.exitCode);
  } else if (
    err instanceof ConfigLoadError ||
    err instanceof ManifestError ||
    err instanceof UnknownPhaseError ||
    err instanceof UnknownChannelError
  ) {
    console.error(chalk.red(`Error: ${err.message}`));
    process.exit(1);
  } else {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(chalk.red(`Error: ${msg}`));
    process.exit(1);
  }
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}
