import { expect } from 'chai';
import { describe, it, beforeEach, afterEach } from 'mocha';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileSecretStore, generateKeyPair } from '../lib/keys';

describe('keys', () => {
  describe('generateKeyPair', () => {
    it('should produce an OpenSSH key pair carrying the comment', () => {
      const { privateKey, publicKey } = generateKeyPair('flint');

      expect(publicKey).to.match(/^ssh-rsa \S+ flint$/);
      expect(privateKey).to.include('PRIVATE KEY');
    }).timeout(10000);
  });

  describe('FileSecretStore', () => {
    let dir: string;

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), 'flint-keys-'));
    });

    afterEach(() => {
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it('should write the key readable by its owner only', async () => {
      const store = new FileSecretStore(path.join(dir, 'secrets'));

      const keyPath = await store.writePrivateKey('test-private-key', 't1');

      expect(keyPath).to.equal(path.join(dir, 'secrets', 't1_private.key'));
      expect(fs.readFileSync(keyPath, 'utf8')).to.equal('test-private-key');
      expect(fs.statSync(keyPath).mode & 0o777).to.equal(0o600);
    });

    it('should delete the key file', async () => {
      const store = new FileSecretStore(dir);
      const keyPath = await store.writePrivateKey('test-private-key', 't1');

      await store.deleteFile(keyPath);

      expect(fs.existsSync(keyPath)).to.equal(false);
    });

    it('should accept deleting a file that is already gone', async () => {
      const store = new FileSecretStore(dir);

      await store.deleteFile(path.join(dir, 'missing_private.key'));

      expect(fs.readdirSync(dir)).to.deep.equal([]);
    });
  });
});
