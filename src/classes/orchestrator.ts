import { EventEmitter } from 'events';
import {
  ComputeClient,
  FireOptions,
  FlintConfig,
  Instance,
  JobSpec,
  RemoteShellTransport,
} from '../interfaces';
import {
  CleanupError,
  FlintError,
  NoInstancesReportedError,
  TooManyInstancesError,
  toError,
} from '../lib/errors';
import { generateKeyPair, KeyPairGenerator, SecretStore } from '../lib/keys';
import { Logger } from '../lib/logger';
import { sleep as defaultSleep, Sleep } from '../lib/sleep';
import { CredentialInjector } from './credential-injector';
import { buildInstanceSpec, readStartupScript } from './instance-spec-builder';
import { OperationPoller } from './operation-poller';
import { RemoteExecutor } from './remote-executor';

export type OrchestratorState =
  | 'Idle'
  | 'ImageResolved'
  | 'InstanceCreating'
  | 'InstanceReady'
  | 'CredentialInjected'
  | 'Executing'
  | 'CleaningUp'
  | 'Done'
  | 'Failed';

export interface OrchestratorDependencies {
  compute: ComputeClient;
  transport: RemoteShellTransport;
  secrets: SecretStore;
  logger: Logger;
  /**
   * @description Resolves once the user allows the instance to be deleted.
   */
  confirm?: (instance: Instance) => Promise<void>;
  generateKeyPair?: KeyPairGenerator;
  sleep?: Sleep;
}

export type OrchestratorConfig = Pick<
  FlintConfig,
  | 'project'
  | 'zone'
  | 'sshUsername'
  | 'maxInstances'
  | 'pollIntervalMs'
  | 'operationTimeoutMs'
>;

export const DEFAULT_RETRY_WAIT = 5;
export const DEFAULT_MAX_RETRY = 5;

/**
 * Runs one job on a throwaway instance: create it, add an SSH key, run the
 * script, and delete the instance and the key whatever happened.
 *
 * Emits `state` with every transition.
 */
export class InstanceOrchestrator extends EventEmitter {
  private state: OrchestratorState = 'Idle';
  private running = false;

  private readonly compute: ComputeClient;
  private readonly secrets: SecretStore;
  private readonly logger: Logger;
  private readonly confirm?: (instance: Instance) => Promise<void>;
  private readonly poller: OperationPoller;
  private readonly injector: CredentialInjector;
  private readonly executor: RemoteExecutor;

  constructor(
    private readonly config: OrchestratorConfig,
    dependencies: OrchestratorDependencies
  ) {
    super();
    this.compute = dependencies.compute;
    this.secrets = dependencies.secrets;
    this.logger = dependencies.logger;
    this.confirm = dependencies.confirm;

    const sleep = dependencies.sleep ?? defaultSleep;

    this.poller = new OperationPoller(
      this.compute,
      config.project,
      config.zone,
      {
        intervalMs: config.pollIntervalMs,
        timeoutMs: config.operationTimeoutMs,
        logger: this.logger,
        sleep,
      }
    );
    this.injector = new CredentialInjector(
      this.compute,
      this.poller,
      this.secrets,
      {
        logger: this.logger,
        generateKeyPair: dependencies.generateKeyPair ?? generateKeyPair,
      }
    );
    this.executor = new RemoteExecutor(dependencies.transport, {
      logger: this.logger,
      sleep,
    });
  }

  get currentState(): OrchestratorState {
    return this.state;
  }

  private transition(state: OrchestratorState) {
    this.state = state;
    this.logger.debug(`State: ${state}`);
    this.emit('state', state);
  }

  async fire(job: JobSpec, options: FireOptions = {}): Promise<string> {
    if (this.running) {
      throw new FlintError('A job is already running on this orchestrator');
    }
    this.running = true;
    this.transition('Idle');

    const { project, zone } = this.config;
    let instance: Instance | undefined;

    try {
      const imageLink = await this.compute.resolveImage(
        job.imageProject ?? project,
        job.imageFamily
      );
      this.transition('ImageResolved');

      const existing = await this.compute.listInstances(project, zone);
      const count = existing?.length ?? 0;
      // not a reservation: concurrent runs can both pass this check
      if (count > this.config.maxInstances) {
        throw new TooManyInstancesError(count, this.config.maxInstances);
      }

      const spec = buildInstanceSpec({
        job,
        project,
        zone,
        imageLink,
        startupScript:
          job.startupScriptPath === undefined
            ? undefined
            : readStartupScript(job.startupScriptPath),
      });

      this.logger.info(`Creating instance ${spec.name}.`);
      if (job.preemptible) {
        this.logger.debug(
          'This instance is preemptible and will live for no longer than 24 hours.'
        );
      }

      this.transition('InstanceCreating');
      const creation = await this.compute.createInstance(project, zone, spec);
      // only an accepted insert makes the instance ours to delete
      instance = { name: spec.name, project, zone };
      await this.poller.waitFor(creation);
    } catch (error) {
      if (!instance) {
        this.finish('Failed');
        throw wrap(error);
      }
      return this.cleanupAfter(instance, options, error);
    }

    let output: string;
    try {
      output = await this.runOn(instance, job, options);
    } catch (error) {
      return this.cleanupAfter(instance, options, error);
    }
    return this.cleanupAfter(instance, options, undefined, output);
  }

  private async runOn(
    instance: Instance,
    job: JobSpec,
    options: FireOptions
  ): Promise<string> {
    const { project, zone } = this.config;

    const instances = await this.compute.listInstances(project, zone);
    if (!instances) {
      throw new NoInstancesReportedError(project, zone);
    }
    this.logger.info(`Instances in project ${project} and zone ${zone}:`);
    for (const { name } of instances) {
      this.logger.info(` - ${name}`);
    }
    this.transition('InstanceReady');

    const credential = await this.injector.inject(
      instance,
      this.config.sshUsername
    );
    instance.privateKeyPath = credential.privateKeyPath;
    instance.externalIp = credential.externalIp;
    this.transition('CredentialInjected');

    this.transition('Executing');
    return this.executor.run({
      externalIp: instance.externalIp,
      keyPath: instance.privateKeyPath,
      scriptPath: job.scriptPath,
      retryWait: options.retryWait ?? DEFAULT_RETRY_WAIT,
      maxRetry: options.maxRetry ?? DEFAULT_MAX_RETRY,
    });
  }

  /**
   * Deletes the instance and the local key, then settles with `output` or
   * the original failure. A cleanup failure never replaces the original one.
   */
  private async cleanupAfter(
    instance: Instance,
    options: FireOptions,
    failure: unknown,
    output?: string
  ): Promise<string> {
    this.transition('CleaningUp');
    const cleanupError = await this.cleanup(instance, options);

    if (failure !== undefined) {
      const error = wrap(failure);
      if (cleanupError) {
        error.cleanupError = cleanupError;
      }
      this.finish('Failed');
      throw error;
    }

    if (cleanupError) {
      this.finish('Failed');
      throw new CleanupError(
        `Cleanup of instance ${instance.name} failed: ${cleanupError.message}`,
        { cause: cleanupError }
      );
    }

    this.finish('Done');
    return output ?? '';
  }

  private async cleanup(
    instance: Instance,
    options: FireOptions
  ): Promise<Error | undefined> {
    let failure: Error | undefined;

    if (options.waitForConfirmation && this.confirm) {
      await this.confirm(instance).catch((error) => {
        this.logger.warn(
          `Confirmation failed, deleting anyway: ${toError(error).message}`
        );
      });
    }

    try {
      this.logger.info(`Deleting instance ${instance.name}`);
      const deletion = await this.compute.deleteInstance(
        instance.project,
        instance.zone,
        instance.name
      );
      if (deletion) {
        await this.poller.waitFor(deletion);
      } else {
        this.logger.info(`Instance ${instance.name} was already gone.`);
      }
    } catch (error) {
      failure = toError(error);
      this.logger.error(
        `Deleting instance ${instance.name} failed: ${failure.message}`
      );
    }

    if (instance.privateKeyPath) {
      const keyPath = instance.privateKeyPath;
      try {
        this.logger.debug('Deleting local key file.');
        await this.secrets.deleteFile(keyPath);
        instance.privateKeyPath = undefined;
      } catch (error) {
        failure = failure ?? toError(error);
        this.logger.error(
          `Deleting ${keyPath} failed: ${toError(error).message}`
        );
      }
    }

    return failure;
  }

  private finish(state: 'Done' | 'Failed') {
    this.transition(state);
    this.running = false;
  }
}

function wrap(error: unknown): FlintError {
  if (error instanceof FlintError) return error;
  const cause = toError(error);
  return new FlintError(cause.message, { cause });
}
