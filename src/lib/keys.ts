import * as fs from 'fs/promises';
import * as path from 'path';
import { utils } from 'ssh2';

export interface KeyPair {
  /**
   * @description OpenSSH private key.
   */
  privateKey: string;
  /**
   * @description OpenSSH public key line, `ssh-rsa AAAA... <comment>`.
   */
  publicKey: string;
}

export type KeyPairGenerator = (comment: string) => KeyPair;

/**
 * Local storage for generated private keys.
 */
export interface SecretStore {
  /**
   * Writes the key readable by its owner only and returns its path.
   */
  writePrivateKey(key: string, name: string): Promise<string>;
  deleteFile(filePath: string): Promise<void>;
}

export const generateKeyPair: KeyPairGenerator = (comment) => {
  const pair = utils.generateKeyPairSync('rsa', { bits: 2048, comment });
  return { privateKey: pair.private, publicKey: pair.public.trim() };
};

export class FileSecretStore implements SecretStore {
  constructor(private readonly dir: string) {}

  async writePrivateKey(key: string, name: string): Promise<string> {
    await fs.mkdir(this.dir, { recursive: true, mode: 0o700 });

    const keyPath = path.join(this.dir, `${name}_private.key`);
    await fs.writeFile(keyPath, key, { mode: 0o600 });
    // mode is only applied on creation
    await fs.chmod(keyPath, 0o600);

    return keyPath;
  }

  async deleteFile(filePath: string): Promise<void> {
    await fs.rm(filePath, { force: true });
  }
}
