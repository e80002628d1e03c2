export interface SSHConnectionConfig {
  host: string;
  port?: number; // default 22
  username: string;
  privateKeyPath: string;
  readyTimeout?: number;
}

export type ProbeResult =
  | { kind: 'probed' }
  | { kind: 'transportFailed'; stderr: string };

export interface ExecutionResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
}

/**
 * Remote shell operations against a freshly booted instance.
 */
export interface RemoteShellTransport {
  probe(host: string, keyPath: string): Promise<ProbeResult>;
  /**
   * Copies a local file into the remote home directory and returns the
   * remote path.
   */
  copyFile(host: string, localPath: string, keyPath: string): Promise<string>;
  runCommand(
    host: string,
    command: string,
    keyPath: string
  ): Promise<ExecutionResult>;
  purgeKnownHost(host: string): Promise<void>;
}
