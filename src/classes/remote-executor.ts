import * as path from 'path';
import shellEscape from 'shell-escape';
import { ExecutionResult, RemoteShellTransport } from '../interfaces';
import {
  RemoteExecutionFailedError,
  ScriptExecutionError,
  toError,
  ValidationError,
} from '../lib/errors';
import { Logger, silentLogger } from '../lib/logger';
import { sleep as defaultSleep, Sleep } from '../lib/sleep';

export interface RunScriptParams {
  externalIp?: string;
  keyPath?: string;
  scriptPath: string;
  /**
   * @description Seconds between two connection attempts.
   */
  retryWait: number;
  /**
   * @description Number of connection attempts.
   */
  maxRetry: number;
}

export interface RemoteExecutorOptions {
  logger?: Logger;
  sleep?: Sleep;
}

/**
 * Runs a script on a freshly created instance. Connecting is retried, since
 * the guest agent installs the key asynchronously; the script itself is not.
 */
export class RemoteExecutor {
  private readonly logger: Logger;
  private readonly sleep: Sleep;

  constructor(
    private readonly transport: RemoteShellTransport,
    options: RemoteExecutorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run({
    externalIp,
    keyPath,
    scriptPath,
    retryWait,
    maxRetry,
  }: RunScriptParams): Promise<string> {
    if (!externalIp) {
      throw new ValidationError('The instance has no external IP address');
    }
    if (!keyPath) {
      throw new ValidationError(
        'An SSH key must be added to the instance before code can be executed'
      );
    }
    if (!scriptPath) {
      throw new ValidationError(
        'No script is given: refusing trivial remote code execution'
      );
    }
    if (!Number.isInteger(maxRetry) || maxRetry < 1) {
      throw new ValidationError('maxRetry must be a positive integer');
    }

    await this.transport.purgeKnownHost(externalIp).catch((error) => {
      this.logger.debug(
        `Could not remove ${externalIp} from known hosts: ${toError(error).message}`
      );
    });

    let lastStderr = '';

    for (let attempt = 1; attempt <= maxRetry; attempt++) {
      this.logger.debug(`Connecting to ${externalIp} (attempt ${attempt}/${maxRetry})`);
      const probe = await this.transport.probe(externalIp, keyPath);

      if (probe.kind === 'probed') {
        return this.execute(externalIp, keyPath, scriptPath);
      }

      lastStderr = probe.stderr;
      this.logger.warn(`Connection to ${externalIp} failed: ${probe.stderr}`);
      if (attempt < maxRetry) {
        await this.sleep(retryWait * 1000);
      }
    }

    throw new RemoteExecutionFailedError(
      `Could not connect to ${externalIp} after ${maxRetry} attempts`,
      lastStderr
    );
  }

  private async execute(
    host: string,
    keyPath: string,
    scriptPath: string
  ): Promise<string> {
    let remotePath: string;
    try {
      remotePath = await this.transport.copyFile(host, scriptPath, keyPath);
    } catch (error) {
      throw new ScriptExecutionError(
        `Error uploading ${scriptPath}: ${toError(error).message}`,
        undefined,
        '',
        { cause: error }
      );
    }

    // A login shell lets the guest agent hand out the service account scopes
    const command = shellEscape(['bash', '-l', path.posix.basename(remotePath)]);

    let result: ExecutionResult;
    try {
      result = await this.transport.runCommand(host, command, keyPath);
    } catch (error) {
      throw new ScriptExecutionError(
        `Error executing ${command}: ${toError(error).message}`,
        undefined,
        '',
        { cause: error }
      );
    }

    if (result.exitCode !== 0) {
      // with a pty the remote stderr arrives on stdout
      throw new ScriptExecutionError(
        `Script failed with exit code ${result.exitCode}`,
        result.exitCode,
        result.stderr || result.stdout
      );
    }

    return result.stdout;
  }
}
