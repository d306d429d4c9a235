import { createCipheriv, createDecipheriv, pbkdf2Sync, randomBytes, timingSafeEqual } from 'crypto';
import { AuthenticationError } from '../base/ServiceError';
import type { EncryptedBlob } from '../../shared/schemas/noteSchemas';

const ALGORITHM = 'aes-256-gcm';
const KEY_LENGTH = 32;
const IV_LENGTH = 12; // GCM standard nonce size
const TAG_LENGTH = 16;
const SALT_LENGTH = 16;

export const DEFAULT_KDF_ITERATIONS = 250_000;

/**
 * A derived AES-256 key together with the salt it was derived with. Only
 * ever held in memory.
 */
export interface CipherKey {
  key: Buffer;
  salt: Buffer;
}

export function generateSalt(): Buffer {
  return randomBytes(SALT_LENGTH);
}

/**
 * PBKDF2-SHA256 from a user passphrase and a stored salt.
 */
export function deriveKey(passphrase: string, salt: Buffer, iterations: number = DEFAULT_KDF_ITERATIONS): CipherKey {
  if (!passphrase) {
    throw new AuthenticationError('Passphrase must not be empty');
  }
  const key = pbkdf2Sync(passphrase, salt, iterations, KEY_LENGTH, 'sha256');
  return { key, salt: Buffer.from(salt) };
}

export function encrypt(plaintext: string, cipherKey: CipherKey): EncryptedBlob {
  const iv = randomBytes(IV_LENGTH);
  const cipher = createCipheriv(ALGORITHM, cipherKey.key, iv, { authTagLength: TAG_LENGTH });
  const ciphertext = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);

  return {
    version: 1,
    salt: cipherKey.salt.toString('base64'),
    iv: iv.toString('base64'),
    ciphertext: ciphertext.toString('base64'),
    tag: cipher.getAuthTag().toString('base64'),
  };
}

/**
 * Opens a blob. Fails with AuthenticationError for a wrong key, a blob
 * sealed under another salt, a malformed envelope or any tampering.
 */
export function decrypt(blob: EncryptedBlob, cipherKey: CipherKey): string {
  const salt = Buffer.from(blob.salt, 'base64');
  if (salt.length !== cipherKey.salt.length || !timingSafeEqual(salt, cipherKey.salt)) {
    throw new AuthenticationError('Blob was sealed with a different key');
  }

  const iv = Buffer.from(blob.iv, 'base64');
  const tag = Buffer.from(blob.tag, 'base64');
  if (iv.length !== IV_LENGTH || tag.length !== TAG_LENGTH) {
    throw new AuthenticationError('Malformed encrypted blob');
  }

  try {
    const decipher = createDecipheriv(ALGORITHM, cipherKey.key, iv, { authTagLength: TAG_LENGTH });
    decipher.setAuthTag(tag);
    const plaintext = Buffer.concat([
      decipher.update(Buffer.from(blob.ciphertext, 'base64')),
      decipher.final(),
    ]);
    return plaintext.toString('utf8');
  } catch (error) {
    throw new AuthenticationError('Ciphertext failed authentication', {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}
