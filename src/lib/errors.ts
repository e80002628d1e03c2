import { OperationErrorDetail } from '../interfaces';

/**
 * Base class of every error a fire run can end with.
 */
export class FlintError extends Error {
  /**
   * @description Set when the cleanup that followed this error failed too.
   */
  cleanupError?: Error;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends FlintError {}

export class ConfigurationError extends FlintError {}

export class InstanceNotFoundError extends FlintError {
  constructor(public readonly instanceName: string) {
    super(`Instance ${instanceName} does not exist`);
  }
}

export class TooManyInstancesError extends FlintError {
  constructor(
    public readonly count: number,
    public readonly limit: number
  ) {
    super(`${count} instances are running, the limit is ${limit}`);
  }
}

export class NoInstancesReportedError extends FlintError {
  constructor(project: string, zone: string) {
    super(
      `Instance creation succeeded but no instances are reported in ${project}/${zone}`
    );
  }
}

export class ResourceExhaustedError extends FlintError {}

export class RemoteOperationFailedError extends FlintError {
  constructor(
    message: string,
    public readonly errors: OperationErrorDetail[]
  ) {
    super(message);
  }
}

export class OperationTimeoutError extends FlintError {
  constructor(
    public readonly operation: string,
    timeoutMs: number
  ) {
    super(`Operation ${operation} did not finish within ${timeoutMs}ms`);
  }
}

export class NoExternalAddressError extends FlintError {
  constructor(instanceName: string) {
    super(`Instance ${instanceName} has no external IP address`);
  }
}

/**
 * The instance never became reachable over SSH.
 */
export class RemoteExecutionFailedError extends FlintError {
  constructor(
    message: string,
    public readonly stderr: string
  ) {
    super(message);
  }
}

/**
 * Copying or running the script failed after the instance was reachable.
 */
export class ScriptExecutionError extends FlintError {
  constructor(
    message: string,
    public readonly exitCode?: number,
    public readonly stderr = '',
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class CleanupError extends FlintError {}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
