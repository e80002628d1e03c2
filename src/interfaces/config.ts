import { LogLevel } from '../lib/logger';

export interface FlintConfig {
  /**
   * @description The project instances are created in.
   */
  project: string;
  /**
   * @description The zone instances are created in.
   */
  zone: string;
  /**
   * @description Service account key file. Application default credentials
   * are used when unset.
   */
  credentialsFile?: string;
  /**
   * @description Remote user the generated key is registered for.
   */
  sshUsername: string;
  /**
   * @description Instance count above which no new instance is created.
   */
  maxInstances: number;
  /**
   * @description Directory the generated private keys are written to.
   */
  secretsDir: string;
  logLevel: LogLevel;
  /**
   * @description Interval between operation polls in milliseconds.
   */
  pollIntervalMs: number;
  /**
   * @description Optional deadline for a single operation in milliseconds.
   */
  operationTimeoutMs?: number;
  /**
   * @description SSH handshake timeout in milliseconds.
   */
  sshReadyTimeoutMs: number;
}
