import { FlintConfig, Instance } from '../interfaces';
import { InstanceOrchestrator } from '../classes/orchestrator';
import { NodeSshTransport } from '../classes/ssh-transport';
import { OperationPoller } from '../classes/operation-poller';
import { createComputeApi, GoogleComputeClient } from './google-compute';
import { FileSecretStore } from './keys';
import { createLogger, Logger } from './logger';

export interface FlintContext {
  config: FlintConfig;
  logger: Logger;
  compute: GoogleComputeClient;
  poller: OperationPoller;
}

/**
 * @description Wires the production collaborators for a configuration.
 */
export function createContext(
  config: FlintConfig,
  logger: Logger = createLogger(config.logLevel)
): FlintContext {
  logger.debug(
    `Starting flint with project ${config.project}, zone ${config.zone}`
  );
  const compute = new GoogleComputeClient(
    createComputeApi(config.credentialsFile),
    logger
  );

  return {
    config,
    logger,
    compute,
    poller: new OperationPoller(compute, config.project, config.zone, {
      intervalMs: config.pollIntervalMs,
      timeoutMs: config.operationTimeoutMs,
      logger,
    }),
  };
}

export function createOrchestrator(
  context: FlintContext,
  confirm?: (instance: Instance) => Promise<void>
): InstanceOrchestrator {
  const { config, logger, compute } = context;

  return new InstanceOrchestrator(config, {
    compute,
    transport: new NodeSshTransport({
      username: config.sshUsername,
      readyTimeout: config.sshReadyTimeoutMs,
      logger,
    }),
    secrets: new FileSecretStore(config.secretsDir),
    logger,
    confirm,
  });
}
