import * as path from 'path';
import {
  ComputeClient,
  ExecutionResult,
  InstanceDescription,
  InstanceSpec,
  InstanceSummary,
  JobSpec,
  MetadataItem,
  OperationRef,
  OperationStatus,
  ProbeResult,
  RemoteShellTransport,
} from '../interfaces';
import { SecretStore } from '../lib/keys';

export const PROJECT = 'proj-a';
export const ZONE = 'us-east1-c';
export const EXTERNAL_IP = '203.0.113.10';

export function testJob(overrides: Partial<JobSpec> = {}): JobSpec {
  return {
    name: 't1',
    scriptPath: '/jobs/run.sh',
    imageFamily: 'fam-a',
    machineType: 'n1-standard-4',
    accelerators: {},
    preemptible: true,
    metadata: [],
    ...overrides,
  };
}

export function describeInstance(
  name: string,
  items: MetadataItem[] = []
): InstanceDescription {
  return {
    name,
    status: 'RUNNING',
    metadata: { fingerprint: 'fp-1', items },
    networkInterfaces: [{ accessConfigs: [{ natIP: EXTERNAL_IP }] }],
  };
}

/**
 * An instance whose external address is not assigned yet.
 */
export function describeInstanceWithoutAddress(
  name: string
): InstanceDescription {
  return {
    ...describeInstance(name),
    networkInterfaces: [{ accessConfigs: [{}] }],
  };
}

/**
 * In-memory control plane where every call succeeds right away.
 */
export class FakeCompute implements ComputeClient {
  instances: InstanceSummary[] = [];
  created: InstanceSpec[] = [];

  async resolveImage(project: string, family: string): Promise<string> {
    return `https://www.googleapis.com/compute/v1/projects/${project}/global/images/${family}-v1`;
  }

  async createInstance(
    _project: string,
    _zone: string,
    spec: InstanceSpec
  ): Promise<OperationRef> {
    this.created.push(spec);
    this.instances.push({ name: spec.name, status: 'RUNNING' });
    return { name: 'op-create' };
  }

  async getInstance(
    _project: string,
    _zone: string,
    name: string
  ): Promise<InstanceDescription | undefined> {
    return this.instances.some((instance) => instance.name === name)
      ? describeInstance(name)
      : undefined;
  }

  async setInstanceMetadata(
    _project: string,
    _zone: string,
    _name: string,
    _items: MetadataItem[],
    _fingerprint: string
  ): Promise<OperationRef> {
    return { name: 'op-metadata' };
  }

  async deleteInstance(
    _project: string,
    _zone: string,
    name: string
  ): Promise<OperationRef | undefined> {
    const before = this.instances.length;
    this.instances = this.instances.filter((instance) => instance.name !== name);
    return this.instances.length < before ? { name: 'op-delete' } : undefined;
  }

  async listInstances(
    _project: string,
    _zone: string
  ): Promise<InstanceSummary[] | undefined> {
    return this.instances.length > 0 ? [...this.instances] : undefined;
  }

  async getOperation(
    _project: string,
    _zone: string,
    operation: string
  ): Promise<OperationStatus> {
    return { name: operation, status: 'DONE' };
  }
}

export class FakeTransport implements RemoteShellTransport {
  async probe(_host: string, _keyPath: string): Promise<ProbeResult> {
    return { kind: 'probed' };
  }

  async copyFile(
    _host: string,
    localPath: string,
    _keyPath: string
  ): Promise<string> {
    return path.basename(localPath);
  }

  async runCommand(
    _host: string,
    _command: string,
    _keyPath: string
  ): Promise<ExecutionResult> {
    return { exitCode: 0, stdout: 'job output\n', stderr: '', duration: 1 };
  }

  async purgeKnownHost(_host: string): Promise<void> {}
}

export class MemorySecretStore implements SecretStore {
  readonly files = new Map<string, string>();

  async writePrivateKey(key: string, name: string): Promise<string> {
    const keyPath = `/secrets/${name}_private.key`;
    this.files.set(keyPath, key);
    return keyPath;
  }

  async deleteFile(filePath: string): Promise<void> {
    this.files.delete(filePath);
  }
}

export const fakeKeyPair = (comment: string) => ({
  privateKey: 'test-private-key',
  publicKey: `ssh-rsa AAAAtestkey ${comment}`,
});

export const noSleep = async (): Promise<void> => {};

export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the promise to reject');
}
