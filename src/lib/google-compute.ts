import { google, compute_v1 } from 'googleapis';
import {
  ComputeClient,
  InstanceDescription,
  InstanceSpec,
  InstanceSummary,
  MetadataItem,
  OperationRef,
  OperationStatus,
} from '../interfaces';
import { FlintError } from './errors';
import { Logger } from './logger';

const COMPUTE_SCOPES = ['https://www.googleapis.com/auth/compute'];

/**
 * @description Builds a Compute Engine v1 API handle. Without a key file the
 * application default credentials are used.
 */
export function createComputeApi(credentialsFile?: string): compute_v1.Compute {
  const auth = new google.auth.GoogleAuth({
    keyFile: credentialsFile,
    scopes: COMPUTE_SCOPES,
  });
  return google.compute({ version: 'v1', auth });
}

function httpStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('response' in error)) {
    return undefined;
  }
  const response = error.response;
  if (
    typeof response !== 'object' ||
    response === null ||
    !('status' in response)
  ) {
    return undefined;
  }
  return typeof response.status === 'number' ? response.status : undefined;
}

export function isNotFound(error: unknown): boolean {
  return httpStatus(error) === 404;
}

function operationRef(
  operation: compute_v1.Schema$Operation,
  action: string
): OperationRef {
  if (!operation.name) {
    throw new FlintError(`${action} did not return an operation`);
  }
  return { name: operation.name };
}

export function toOperationStatus(
  operation: compute_v1.Schema$Operation
): OperationStatus {
  const errors = operation.error?.errors;

  return {
    name: operation.name ?? '',
    status: operation.status ?? 'PENDING',
    errors: errors
      ? errors.map((error) => ({
          code: error.code ?? 'UNKNOWN',
          message: error.message ?? '',
        }))
      : undefined,
  };
}

function toMetadataItems(
  items: compute_v1.Schema$Metadata['items']
): MetadataItem[] {
  const result: MetadataItem[] = [];
  for (const item of items ?? []) {
    if (item.key) {
      result.push({ key: item.key, value: item.value ?? '' });
    }
  }
  return result;
}

export function toInstanceDescription(
  instance: compute_v1.Schema$Instance
): InstanceDescription {
  return {
    name: instance.name ?? '',
    status: instance.status ?? undefined,
    metadata: {
      fingerprint: instance.metadata?.fingerprint ?? '',
      items: toMetadataItems(instance.metadata?.items),
    },
    networkInterfaces: (instance.networkInterfaces ?? []).map((nic) => ({
      accessConfigs: (nic.accessConfigs ?? []).map((config) => ({
        natIP: config.natIP ?? undefined,
      })),
    })),
  };
}

export function toInstanceSummary(
  instance: compute_v1.Schema$Instance
): InstanceSummary {
  return {
    name: instance.name ?? '',
    status: instance.status ?? undefined,
    externalIp:
      instance.networkInterfaces?.[0]?.accessConfigs?.[0]?.natIP ?? undefined,
  };
}

export function toInstanceResource(
  spec: InstanceSpec
): compute_v1.Schema$Instance {
  return {
    name: spec.name,
    machineType: spec.machineType,
    scheduling: { ...spec.scheduling },
    disks: spec.disks.map((disk) => ({
      ...disk,
      initializeParams: { ...disk.initializeParams },
    })),
    networkInterfaces: spec.networkInterfaces.map((nic) => ({
      network: nic.network,
      accessConfigs: nic.accessConfigs.map((config) => ({ ...config })),
    })),
    guestAccelerators: spec.guestAccelerators.map((accelerator) => ({
      ...accelerator,
    })),
    serviceAccounts: spec.serviceAccounts.map((account) => ({
      email: account.email,
      scopes: [...account.scopes],
    })),
    metadata: { items: spec.metadata.items.map((item) => ({ ...item })) },
  };
}

/**
 * ComputeClient backed by the Compute Engine REST API.
 */
export class GoogleComputeClient implements ComputeClient {
  constructor(
    private readonly api: compute_v1.Compute,
    private readonly logger: Logger
  ) {}

  async resolveImage(project: string, family: string): Promise<string> {
    this.logger.debug(`Getting image ${family} from project ${project}`);
    const { data } = await this.api.images.getFromFamily({ project, family });

    if (!data.selfLink) {
      throw new FlintError(`Image family ${family} has no image in ${project}`);
    }

    this.logger.debug(`Got ${data.selfLink}`);
    return data.selfLink;
  }

  async createInstance(
    project: string,
    zone: string,
    spec: InstanceSpec
  ): Promise<OperationRef> {
    const { data } = await this.api.instances.insert({
      project,
      zone,
      requestBody: toInstanceResource(spec),
    });
    return operationRef(data, `Creating instance ${spec.name}`);
  }

  async getInstance(
    project: string,
    zone: string,
    name: string
  ): Promise<InstanceDescription | undefined> {
    try {
      const { data } = await this.api.instances.get({
        project,
        zone,
        instance: name,
      });
      return toInstanceDescription(data);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  async setInstanceMetadata(
    project: string,
    zone: string,
    name: string,
    items: MetadataItem[],
    fingerprint: string
  ): Promise<OperationRef> {
    const { data } = await this.api.instances.setMetadata({
      project,
      zone,
      instance: name,
      requestBody: { fingerprint, items },
    });
    return operationRef(data, `Updating metadata of ${name}`);
  }

  async deleteInstance(
    project: string,
    zone: string,
    name: string
  ): Promise<OperationRef | undefined> {
    try {
      const { data } = await this.api.instances.delete({
        project,
        zone,
        instance: name,
      });
      return operationRef(data, `Deleting instance ${name}`);
    } catch (error) {
      if (isNotFound(error)) return undefined;
      throw error;
    }
  }

  async listInstances(
    project: string,
    zone: string
  ): Promise<InstanceSummary[] | undefined> {
    const instances: InstanceSummary[] = [];
    let pageToken: string | undefined;

    do {
      const { data } = await this.api.instances.list({
        project,
        zone,
        pageToken,
      });
      for (const instance of data.items ?? []) {
        instances.push(toInstanceSummary(instance));
      }
      pageToken = data.nextPageToken ?? undefined;
    } while (pageToken);

    return instances.length > 0 ? instances : undefined;
  }

  async getOperation(
    project: string,
    zone: string,
    operation: string
  ): Promise<OperationStatus> {
    const { data } = await this.api.zoneOperations.get({
      project,
      zone,
      operation,
    });
    return toOperationStatus(data);
  }
}
