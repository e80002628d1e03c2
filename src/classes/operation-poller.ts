import {
  ComputeClient,
  OperationErrorDetail,
  OperationRef,
  OperationStatus,
} from '../interfaces';
import {
  OperationTimeoutError,
  RemoteOperationFailedError,
  ResourceExhaustedError,
} from '../lib/errors';
import { Logger, silentLogger } from '../lib/logger';
import { sleep as defaultSleep, Sleep } from '../lib/sleep';

export const RESOURCE_EXHAUSTED_CODES: readonly string[] = [
  'ZONE_RESOURCE_POOL_EXHAUSTED',
  'ZONE_RESOURCE_POOL_EXHAUSTED_WITH_DETAILS',
];

export interface OperationPollerOptions {
  /**
   * @description Delay between two polls in milliseconds.
   */
  intervalMs?: number;
  /**
   * @description Give up after this many milliseconds. Unbounded when unset.
   */
  timeoutMs?: number;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Maps the errors of a finished operation to a typed failure.
 */
export function operationFailure(
  operation: string,
  errors: OperationErrorDetail[]
): ResourceExhaustedError | RemoteOperationFailedError {
  if (errors.length === 1) {
    const [error] = errors;
    if (RESOURCE_EXHAUSTED_CODES.includes(error.code)) {
      return new ResourceExhaustedError(error.message);
    }
    return new RemoteOperationFailedError(error.message, errors);
  }

  const summary = errors
    .map((error) => `${error.code}: ${error.message}`)
    .join('; ');
  return new RemoteOperationFailedError(
    `Operation ${operation} failed with ${errors.length} errors: ${summary}`,
    errors
  );
}

/**
 * Blocks until a zonal operation reaches DONE, polling at a fixed interval.
 */
export class OperationPoller {
  private readonly intervalMs: number;
  private readonly timeoutMs?: number;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(
    private readonly compute: ComputeClient,
    private readonly project: string,
    private readonly zone: string,
    options: OperationPollerOptions = {}
  ) {
    this.intervalMs = options.intervalMs ?? 1000;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async waitFor(operation: OperationRef): Promise<OperationStatus> {
    this.logger.info(`Waiting for operation ${operation.name} to finish...`);
    const startedAt = this.now();

    for (;;) {
      const result = await this.compute.getOperation(
        this.project,
        this.zone,
        operation.name
      );

      if (result.status === 'DONE') {
        this.logger.info(`Operation ${operation.name} done.`);

        if (result.errors && result.errors.length > 0) {
          throw operationFailure(operation.name, result.errors);
        }
        return result;
      }

      if (
        this.timeoutMs !== undefined &&
        this.now() - startedAt >= this.timeoutMs
      ) {
        throw new OperationTimeoutError(operation.name, this.timeoutMs);
      }

      await this.sleep(this.intervalMs);
    }
  }
}
