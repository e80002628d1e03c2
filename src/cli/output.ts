import chalk from 'chalk';
import {
  FlintError,
  RemoteExecutionFailedError,
  ScriptExecutionError,
  toError,
  ValidationError,
} from '../lib/errors';

/**
 * Renders a failure as the lines printed to stderr.
 */
export function formatError(error: unknown): string[] {
  const err = toError(error);
  const kind =
    err instanceof ValidationError
      ? 'Validation Error'
      : err.name === 'Error' || err.name === 'FlintError'
        ? 'Error'
        : err.name;

  const lines = [chalk.red(`✗ ${kind}: ${err.message}`)];

  if (
    (err instanceof RemoteExecutionFailedError ||
      err instanceof ScriptExecutionError) &&
    err.stderr
  ) {
    lines.push(chalk.dim(err.stderr.trimEnd()));
  }

  if (err instanceof FlintError && err.cleanupError) {
    lines.push(
      chalk.red(`✗ Cleanup also failed: ${err.cleanupError.message}`)
    );
  }

  return lines;
}

export function exitWithError(error: unknown): never {
  for (const line of formatError(error)) {
    console.error(line);
  }
  process.exit(1);
}

export function collect(value: string, previous: string[]): string[] {
  return previous.concat([value]);
}
