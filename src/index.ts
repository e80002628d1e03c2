export * from './interfaces';
export * from './lib/errors';
export { createLogger, silentLogger } from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';
export { loadConfig } from './lib/config';
export { loadJobFile, createJobSpec } from './lib/job-loader';
export { FileSecretStore, generateKeyPair } from './lib/keys';
export type { SecretStore, KeyPair } from './lib/keys';
export { GoogleComputeClient, createComputeApi } from './lib/google-compute';
export { createContext, createOrchestrator } from './lib/context';
export {
  buildInstanceSpec,
  readStartupScript,
} from './classes/instance-spec-builder';
export { OperationPoller } from './classes/operation-poller';
export { CredentialInjector } from './classes/credential-injector';
export { RemoteExecutor } from './classes/remote-executor';
export { NodeSshTransport } from './classes/ssh-transport';
export { InstanceOrchestrator } from './classes/orchestrator';
export type { OrchestratorState } from './classes/orchestrator';
