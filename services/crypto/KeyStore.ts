import fs from 'fs-extra';
import path from 'path';
import { BaseService } from '../base/BaseService';
import { AuthenticationError, DecryptionError } from '../base/ServiceError';
import { KeyFileSchema, type KeyFile } from '../../shared/schemas/configSchemas';
import { validatePayload } from '../../utils/validatePayload';
import { DEFAULT_KDF_ITERATIONS, decrypt, deriveKey, encrypt, generateSalt, type CipherKey } from './cipher';

const KEY_CHECK_MARKER = 'note-taker-pro:key-check:v1';
const OWNER_ONLY = 0o600;

interface KeyStoreDeps {
  keyFilePath: string;
  iterations?: number; // only used when the key file is first created
}

/**
 * Owns the key file: the salt and KDF parameters plus a sealed marker used
 * to tell a wrong passphrase apart before any note is touched. The derived
 * key itself is never written anywhere.
 */
export class KeyStore extends BaseService<KeyStoreDeps> {
  constructor(deps: KeyStoreDeps) {
    super('KeyStore', deps);
  }

  async exists(): Promise<boolean> {
    return fs.pathExists(this.deps.keyFilePath);
  }

  /**
   * Derives the key for `passphrase`, creating the key file on first use.
   * @throws DecryptionError when the passphrase does not match the key file
   */
  async unlock(passphrase: string): Promise<CipherKey> {
    return this.execute('unlock', async () => {
      if (!(await this.exists())) {
        return this.create(passphrase);
      }

      const keyFile = await this.read();
      const cipherKey = deriveKey(passphrase, Buffer.from(keyFile.salt, 'base64'), keyFile.iterations);

      try {
        if (decrypt(keyFile.check, cipherKey) !== KEY_CHECK_MARKER) {
          throw new AuthenticationError('Key check marker mismatch');
        }
      } catch (error) {
        if (error instanceof AuthenticationError) {
          throw new DecryptionError('Wrong passphrase for this note store');
        }
        throw error;
      }

      return cipherKey;
    }, { keyFilePath: this.deps.keyFilePath });
  }

  private async create(passphrase: string): Promise<CipherKey> {
    const iterations = this.deps.iterations ?? DEFAULT_KDF_ITERATIONS;
    const cipherKey = deriveKey(passphrase, generateSalt(), iterations);
    const keyFile: KeyFile = {
      version: 1,
      kdf: 'pbkdf2-sha256',
      iterations,
      salt: cipherKey.salt.toString('base64'),
      check: encrypt(KEY_CHECK_MARKER, cipherKey),
    };

    await fs.ensureDir(path.dirname(this.deps.keyFilePath));
    await fs.writeFile(this.deps.keyFilePath, JSON.stringify(keyFile, null, 2), { mode: OWNER_ONLY, flag: 'wx' });
    // mode on open is filtered by the umask
    await fs.chmod(this.deps.keyFilePath, OWNER_ONLY);

    this.logInfo(`Created key file at ${this.deps.keyFilePath}`);
    return cipherKey;
  }

  private async read(): Promise<KeyFile> {
    await this.restrictPermissions();
    const raw: unknown = await fs.readJson(this.deps.keyFilePath);
    return validatePayload(KeyFileSchema, raw, 'key file');
  }

  /**
   * Tightens a key file that is readable by group or others. Windows has no
   * POSIX mode bits to check.
   */
  private async restrictPermissions(): Promise<void> {
    if (process.platform === 'win32') {
      return;
    }
    const stats = await fs.stat(this.deps.keyFilePath);
    if ((stats.mode & 0o077) !== 0) {
      this.logWarn(`Key file ${this.deps.keyFilePath} had mode ${(stats.mode & 0o777).toString(8)}; restricting to 600`);
      await fs.chmod(this.deps.keyFilePath, OWNER_ONLY);
    }
  }
}
