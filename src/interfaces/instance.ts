import { MetadataItem } from './job';

export interface AcceleratorConfig {
  readonly acceleratorType: string;
  readonly acceleratorCount: number;
}

export interface AttachedDiskConfig {
  readonly boot: boolean;
  readonly autoDelete: boolean;
  readonly diskSizeGb: string;
  readonly initializeParams: { readonly sourceImage: string };
}

export interface NetworkInterfaceConfig {
  readonly network: string;
  readonly accessConfigs: readonly { readonly type: string; readonly name: string }[];
}

export interface SchedulingConfig {
  readonly preemptible: boolean;
  readonly onHostMaintenance: 'TERMINATE';
  readonly automaticRestart: false;
}

/**
 * Request body for an instance insert. Machine and accelerator types are
 * qualified by project and zone, so a spec only exists once both are known.
 */
export interface InstanceSpec {
  readonly name: string;
  readonly machineType: string;
  readonly scheduling: SchedulingConfig;
  readonly disks: readonly AttachedDiskConfig[];
  readonly networkInterfaces: readonly NetworkInterfaceConfig[];
  readonly guestAccelerators: readonly AcceleratorConfig[];
  readonly serviceAccounts: readonly {
    readonly email: string;
    readonly scopes: readonly string[];
  }[];
  readonly metadata: { readonly items: readonly MetadataItem[] };
}

export interface Instance {
  name: string;
  project: string;
  zone: string;
  /**
   * @description Assigned by the provider, known after the credential has
   * been injected.
   */
  externalIp?: string;
  /**
   * @description Local private key file, set once a credential exists.
   */
  privateKeyPath?: string;
}
