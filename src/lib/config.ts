import * as path from 'path';
import { FlintConfig } from '../interfaces';
import { isLogLevel, LOG_LEVELS } from './logger';
import {
  sanitizeFilePath,
  sanitizeNumber,
  sanitizeProjectId,
  sanitizeSSHUsername,
  sanitizeZone,
} from './sanitization';
import { ConfigurationError, ValidationError } from './errors';

export const DEFAULT_MAX_INSTANCES = 10;
export const DEFAULT_POLL_INTERVAL_MS = 1000;
export const DEFAULT_SSH_READY_TIMEOUT_MS = 20000;
export const DEFAULT_SSH_USERNAME = 'flint';

export interface ConfigOverrides {
  project?: string;
  zone?: string;
}

/**
 * @description Builds the run configuration from environment variables.
 * Command line values in `overrides` win over the environment.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): FlintConfig {
  try {
    const project = overrides.project ?? env.GCP_PROJECT;
    const zone = overrides.zone ?? env.GCP_ZONE;

    if (!project || !zone) {
      throw new ConfigurationError(
        'Project and zone are required. Provide them via options or environment variables (GCP_PROJECT, GCP_ZONE)'
      );
    }

    const logLevel = env.FLINT_LOG_LEVEL ?? 'info';
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(
        `FLINT_LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`
      );
    }

    const timeout = env.FLINT_OPERATION_TIMEOUT;

    return {
      project: sanitizeProjectId(project),
      zone: sanitizeZone(zone),
      credentialsFile: env.GOOGLE_APPLICATION_CREDENTIALS
        ? sanitizeFilePath(
            env.GOOGLE_APPLICATION_CREDENTIALS,
            'GOOGLE_APPLICATION_CREDENTIALS'
          )
        : undefined,
      sshUsername: sanitizeSSHUsername(
        env.FLINT_SSH_USERNAME ?? DEFAULT_SSH_USERNAME
      ),
      maxInstances: env.FLINT_MAX_INSTANCES
        ? sanitizeNumber(env.FLINT_MAX_INSTANCES, 'FLINT_MAX_INSTANCES', 0)
        : DEFAULT_MAX_INSTANCES,
      secretsDir: env.FLINT_SECRETS_DIR
        ? sanitizeFilePath(env.FLINT_SECRETS_DIR, 'FLINT_SECRETS_DIR')
        : path.join(process.cwd(), 'secrets'),
      logLevel,
      pollIntervalMs: env.FLINT_POLL_INTERVAL_MS
        ? sanitizeNumber(
            env.FLINT_POLL_INTERVAL_MS,
            'FLINT_POLL_INTERVAL_MS',
            100,
            60000
          )
        : DEFAULT_POLL_INTERVAL_MS,
      operationTimeoutMs: timeout
        ? sanitizeNumber(timeout, 'FLINT_OPERATION_TIMEOUT', 1) * 1000
        : undefined,
      sshReadyTimeoutMs: env.FLINT_SSH_READY_TIMEOUT
        ? sanitizeNumber(
            env.FLINT_SSH_READY_TIMEOUT,
            'FLINT_SSH_READY_TIMEOUT',
            1000
          )
        : DEFAULT_SSH_READY_TIMEOUT_MS,
    };
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ConfigurationError(error.message, { cause: error });
    }
    throw error;
  }
}
