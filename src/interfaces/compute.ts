import { MetadataItem } from './job';
import { InstanceSpec } from './instance';

export interface OperationRef {
  name: string;
}

export interface OperationErrorDetail {
  code: string;
  message: string;
}

export interface OperationStatus {
  name: string;
  /**
   * @description PENDING, RUNNING or DONE.
   */
  status: string;
  errors?: OperationErrorDetail[];
}

export interface InstanceDescription {
  name: string;
  status?: string;
  metadata: {
    fingerprint: string;
    items: MetadataItem[];
  };
  networkInterfaces: { accessConfigs: { natIP?: string }[] }[];
}

export interface InstanceSummary {
  name: string;
  status?: string;
  externalIp?: string;
}

/**
 * The slice of the Compute Engine control plane the orchestrator needs.
 */
export interface ComputeClient {
  resolveImage(project: string, family: string): Promise<string>;
  createInstance(
    project: string,
    zone: string,
    spec: InstanceSpec
  ): Promise<OperationRef>;
  /**
   * Resolves to undefined when the instance does not exist.
   */
  getInstance(
    project: string,
    zone: string,
    name: string
  ): Promise<InstanceDescription | undefined>;
  setInstanceMetadata(
    project: string,
    zone: string,
    name: string,
    items: MetadataItem[],
    fingerprint: string
  ): Promise<OperationRef>;
  /**
   * Resolves to undefined when there was nothing to delete.
   */
  deleteInstance(
    project: string,
    zone: string,
    name: string
  ): Promise<OperationRef | undefined>;
  /**
   * Resolves to undefined when the provider reports no instances at all.
   */
  listInstances(
    project: string,
    zone: string
  ): Promise<InstanceSummary[] | undefined>;
  getOperation(
    project: string,
    zone: string,
    operation: string
  ): Promise<OperationStatus>;
}
