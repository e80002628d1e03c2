import * as fs from 'fs';
import { InstanceSpec, JobSpec, MetadataItem } from '../interfaces';
import { ConfigurationError } from '../lib/errors';

export const BOOT_DISK_SIZE_GB = '50';

export const SERVICE_ACCOUNT_SCOPES = [
  'https://www.googleapis.com/auth/devstorage.read_write',
  'https://www.googleapis.com/auth/logging.write',
  'https://www.googleapis.com/auth/datastore',
  'https://www.googleapis.com/auth/monitoring.write',
  'https://www.googleapis.com/auth/service.management.readonly',
  'https://www.googleapis.com/auth/servicecontrol',
  'https://www.googleapis.com/auth/trace.append',
] as const;

export interface BuildInstanceSpecInput {
  job: JobSpec;
  project: string;
  zone: string;
  /**
   * @description Self link of the resolved boot image.
   */
  imageLink: string;
  /**
   * @description Contents of the job's startup script, if it has one.
   */
  startupScript?: string;
}

/**
 * @description Reads a startup script. Failing to read it is a
 * configuration error and is not retried.
 */
export function readStartupScript(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read startup script ${filePath}`, {
      cause: error,
    });
  }
}

/**
 * @description Renders a job into an instance insert request for the given
 * project and zone.
 */
export function buildInstanceSpec({
  job,
  project,
  zone,
  imageLink,
  startupScript,
}: BuildInstanceSpecInput): InstanceSpec {
  const guestAccelerators = Object.entries(job.accelerators).map(
    ([label, count]) => ({
      acceleratorType: `projects/${project}/zones/${zone}/acceleratorTypes/${label}`,
      acceleratorCount: count,
    })
  );

  const items: MetadataItem[] = [
    { key: 'serial-port-enable', value: 'FALSE' },
    { key: 'enable-oslogin', value: 'FALSE' },
    ...job.metadata.map((item) => ({ ...item })),
  ];

  if (startupScript !== undefined) {
    // Executed by the guest agent on every boot
    items.push({ key: 'startup-script', value: startupScript });
  }

  const spec: InstanceSpec = {
    name: job.name,
    machineType: `zones/${zone}/machineTypes/${job.machineType}`,
    scheduling: {
      preemptible: job.preemptible,
      onHostMaintenance: 'TERMINATE',
      automaticRestart: false,
    },
    disks: [
      {
        boot: true,
        autoDelete: true,
        diskSizeGb: BOOT_DISK_SIZE_GB,
        initializeParams: { sourceImage: imageLink },
      },
    ],
    networkInterfaces: [
      {
        network: 'global/networks/default',
        accessConfigs: [{ type: 'ONE_TO_ONE_NAT', name: 'External NAT' }],
      },
    ],
    guestAccelerators,
    serviceAccounts: [{ email: 'default', scopes: SERVICE_ACCOUNT_SCOPES }],
    metadata: { items },
  };

  return Object.freeze(spec);
}
