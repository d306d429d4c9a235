import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { KeyStore } from '../KeyStore';
import { decrypt, encrypt } from '../cipher';
import { DecryptionError, ValidationError } from '../../base/ServiceError';

vi.mock('../../../utils/logger', async () => (await import('../../../test-utils/mocks/logger')).mockLoggerModule);

describe('KeyStore', () => {
  let dir: string;
  let keyFilePath: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'notetaker-keystore-'));
    keyFilePath = path.join(dir, 'nested', 'notes.key');
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should create the key file on first unlock without storing the key', async () => {
    const store = new KeyStore({ keyFilePath, iterations: 1000 });
    expect(await store.exists()).toBe(false);

    const key = await store.unlock('test-secret');

    const keyFile = await fs.readJson(keyFilePath);
    expect(keyFile).toMatchObject({ version: 1, kdf: 'pbkdf2-sha256', iterations: 1000, salt: key.salt.toString('base64') });
    expect(JSON.stringify(keyFile)).not.toContain(key.key.toString('base64'));
    expect(await store.exists()).toBe(true);
  });

  it.skipIf(process.platform === 'win32')('should write the key file readable by the owner only', async () => {
    await new KeyStore({ keyFilePath, iterations: 1000 }).unlock('test-secret');

    const stats = await fs.stat(keyFilePath);
    expect(stats.mode & 0o777).toBe(0o600);
  });

  it.skipIf(process.platform === 'win32')('should tighten a key file others can read', async () => {
    await new KeyStore({ keyFilePath, iterations: 1000 }).unlock('test-secret');
    await fs.chmod(keyFilePath, 0o644);

    await new KeyStore({ keyFilePath }).unlock('test-secret');

    expect((await fs.stat(keyFilePath)).mode & 0o777).toBe(0o600);
  });

  it('should derive the same key on later unlocks', async () => {
    const first = await new KeyStore({ keyFilePath, iterations: 1000 }).unlock('test-secret');
    const second = await new KeyStore({ keyFilePath }).unlock('test-secret');

    expect(decrypt(encrypt('hello', first), second)).toBe('hello');
  });

  it('should reject the wrong passphrase', async () => {
    await new KeyStore({ keyFilePath, iterations: 1000 }).unlock('test-secret');

    await expect(new KeyStore({ keyFilePath }).unlock('not-the-secret')).rejects.toThrow(DecryptionError);
  });

  it('should reject a corrupted key file', async () => {
    await fs.outputFile(keyFilePath, JSON.stringify({ version: 1, salt: 'abc' }));

    await expect(new KeyStore({ keyFilePath }).unlock('test-secret')).rejects.toThrow(ValidationError);
  });
});
