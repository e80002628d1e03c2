import { execFile } from 'child_process';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';
import { NodeSSH } from 'node-ssh';
import {
  ExecutionResult,
  ProbeResult,
  RemoteShellTransport,
  SSHConnectionConfig,
} from '../interfaces';
import { toError } from '../lib/errors';
import { Logger, silentLogger } from '../lib/logger';

const execFileAsync = promisify(execFile);

export interface NodeSshTransportOptions {
  username: string;
  port?: number;
  readyTimeout?: number;
  knownHostsFile?: string;
  logger?: Logger;
}

/**
 * RemoteShellTransport over node-ssh. Every call opens its own connection,
 * host keys are not verified.
 */
export class NodeSshTransport implements RemoteShellTransport {
  private readonly logger: Logger;
  private readonly knownHostsFile: string;

  constructor(private readonly options: NodeSshTransportOptions) {
    this.logger = options.logger ?? silentLogger;
    this.knownHostsFile =
      options.knownHostsFile ?? path.join(os.homedir(), '.ssh', 'known_hosts');
  }

  private config(host: string, keyPath: string): SSHConnectionConfig {
    return {
      host,
      port: this.options.port ?? 22,
      username: this.options.username,
      privateKeyPath: keyPath,
      readyTimeout: this.options.readyTimeout ?? 20000,
    };
  }

  private async withConnection<T>(
    host: string,
    keyPath: string,
    action: (ssh: NodeSSH) => Promise<T>
  ): Promise<T> {
    const ssh = new NodeSSH();
    await ssh.connect(this.config(host, keyPath));
    try {
      return await action(ssh);
    } finally {
      ssh.dispose();
    }
  }

  /**
   * Test the connection to the remote server
   */
  async probe(host: string, keyPath: string): Promise<ProbeResult> {
    try {
      const result = await this.withConnection(host, keyPath, (ssh) =>
        ssh.execCommand('echo 1')
      );
      if (result.code === 0) {
        return { kind: 'probed' };
      }
      return { kind: 'transportFailed', stderr: result.stderr };
    } catch (error) {
      return { kind: 'transportFailed', stderr: toError(error).message };
    }
  }

  /**
   * Transfer a file into the remote home directory
   */
  async copyFile(
    host: string,
    localPath: string,
    keyPath: string
  ): Promise<string> {
    // relative SFTP paths resolve against the home directory
    const remotePath = path.basename(localPath);
    this.logger.debug(`Copying ${localPath} to ${host}:~/${remotePath}`);

    await this.withConnection(host, keyPath, (ssh) =>
      ssh.putFile(localPath, remotePath)
    );
    return remotePath;
  }

  /**
   * Runs a command in a pty, so the remote stderr is merged into stdout.
   */
  async runCommand(
    host: string,
    command: string,
    keyPath: string
  ): Promise<ExecutionResult> {
    const startTime = Date.now();
    this.logger.debug(`Running command on ${host}: ${command}`);

    const result = await this.withConnection(host, keyPath, (ssh) =>
      ssh.execCommand(command, {
        execOptions: { pty: true },
        onStdout: (chunk) => this.logger.debug(`[stdout] ${chunk.toString()}`),
        onStderr: (chunk) => this.logger.debug(`[stderr] ${chunk.toString()}`),
      })
    );

    return {
      exitCode: result.code ?? 0,
      stdout: result.stdout,
      stderr: result.stderr,
      duration: Date.now() - startTime,
    };
  }

  /**
   * Drop stale host keys, addresses are reused by other instances.
   */
  async purgeKnownHost(host: string): Promise<void> {
    this.logger.debug(`Removing ${host} from ${this.knownHostsFile}`);
    await execFileAsync('ssh-keygen', ['-f', this.knownHostsFile, '-R', host]);
  }
}
