import {
  ComputeClient,
  Instance,
  InstanceDescription,
  MetadataItem,
} from '../interfaces';
import {
  InstanceNotFoundError,
  NoExternalAddressError,
  toError,
} from '../lib/errors';
import { generateKeyPair, KeyPairGenerator, SecretStore } from '../lib/keys';
import { Logger, silentLogger } from '../lib/logger';
import { OperationPoller } from './operation-poller';

export const SSH_KEYS_METADATA_KEY = 'ssh-keys';

export interface InjectedCredential {
  privateKeyPath: string;
  externalIp: string;
}

export interface CredentialInjectorOptions {
  logger?: Logger;
  generateKeyPair?: KeyPairGenerator;
}

/**
 * Appends `entry` to the ssh-keys item, keeping every other item and the
 * item order as they are. The ssh-keys item is added last when missing.
 */
export function mergeSshKey(
  items: readonly MetadataItem[],
  entry: string
): MetadataItem[] {
  const index = items.findIndex((item) => item.key === SSH_KEYS_METADATA_KEY);

  if (index === -1) {
    return [...items, { key: SSH_KEYS_METADATA_KEY, value: entry }];
  }

  const keys = items[index].value.split('\n').filter((line) => line !== '');
  keys.push(entry);

  return items.map((item, i) =>
    i === index ? { key: SSH_KEYS_METADATA_KEY, value: keys.join('\n') } : item
  );
}

export function externalAddressOf(
  description: InstanceDescription
): string | undefined {
  return description.networkInterfaces[0]?.accessConfigs[0]?.natIP;
}

/**
 * Registers a freshly generated SSH key on an instance through its metadata.
 */
export class CredentialInjector {
  private readonly logger: Logger;
  private readonly generateKeyPair: KeyPairGenerator;

  constructor(
    private readonly compute: ComputeClient,
    private readonly poller: OperationPoller,
    private readonly secrets: SecretStore,
    options: CredentialInjectorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.generateKeyPair = options.generateKeyPair ?? generateKeyPair;
  }

  async inject(
    instance: Instance,
    username: string
  ): Promise<InjectedCredential> {
    this.logger.debug(`Getting instance ${instance.name} data.`);
    const description = await this.describe(instance);

    // The fingerprint makes the update fail if someone else wrote metadata
    // in between.
    const { fingerprint, items } = description.metadata;

    this.logger.info('Generating keypair.');
    const { privateKey, publicKey } = this.generateKeyPair(username);
    const privateKeyPath = await this.secrets.writePrivateKey(
      privateKey,
      instance.name
    );
    this.logger.info(`Private key file available at: ${privateKeyPath}`);

    try {
      const externalIp = await this.register(
        instance,
        description,
        mergeSshKey(items, `${username}:${publicKey}`),
        fingerprint,
        username
      );
      return { privateKeyPath, externalIp };
    } catch (error) {
      // The caller never learns the path, so the key is removed here
      await this.secrets.deleteFile(privateKeyPath).catch((deleteError) => {
        this.logger.warn(
          `Could not delete ${privateKeyPath}: ${toError(deleteError).message}`
        );
      });
      throw error;
    }
  }

  private async register(
    instance: Instance,
    description: InstanceDescription,
    items: MetadataItem[],
    fingerprint: string,
    username: string
  ): Promise<string> {
    this.logger.info(`Adding public key to instance (user:${username})...`);
    const operation = await this.compute.setInstanceMetadata(
      instance.project,
      instance.zone,
      instance.name,
      items,
      fingerprint
    );
    await this.poller.waitFor(operation);

    let externalIp = externalAddressOf(description);
    if (externalIp === undefined) {
      externalIp = externalAddressOf(await this.describe(instance));
    }
    if (externalIp === undefined) {
      throw new NoExternalAddressError(instance.name);
    }

    this.logger.info(`Instance ${instance.name} external ip is ${externalIp}`);
    return externalIp;
  }

  private async describe(instance: Instance): Promise<InstanceDescription> {
    const description = await this.compute.getInstance(
      instance.project,
      instance.zone,
      instance.name
    );

    if (!description) {
      this.logger.error(`Instance ${instance.name} does not exist.`);
      throw new InstanceNotFoundError(instance.name);
    }

    return description;
  }
}
