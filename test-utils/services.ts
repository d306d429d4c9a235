import Database from 'better-sqlite3';
import runMigrations from '../models/runMigrations';
import initModels, { type ModelRegistry } from '../cli/bootstrap/modelBootstrap';
import { initializeServices, type ServiceRegistry } from '../cli/bootstrap/serviceBootstrap';
import { deriveKey, type CipherKey } from '../services/crypto/cipher';
import type { RemoteNoteStore } from '../services/sync/RemoteNoteStore';

/** Low iteration count so key derivation stays fast in tests. */
export const TEST_KDF_ITERATIONS = 1000;

export function testKey(passphrase = 'test-secret', saltByte = 7): CipherKey {
  return deriveKey(passphrase, Buffer.alloc(16, saltByte), TEST_KDF_ITERATIONS);
}

/**
 * A clock the test moves by hand.
 */
export function createClock(startIso: string) {
  let current = new Date(startIso).getTime();
  return {
    now: () => new Date(current),
    set: (iso: string) => {
      current = new Date(iso).getTime();
    },
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export interface TestServicesOptions {
  db?: Database.Database;
  cipherKey?: CipherKey | null;
  remote?: RemoteNoteStore | null;
  now?: () => Date;
}

export interface TestServices extends ServiceRegistry {
  db: Database.Database;
  models: ModelRegistry;
}

/**
 * Wires the real services over an in-memory database, the way the CLI
 * session does. Retries never sleep.
 */
export async function createTestServices(options: TestServicesOptions = {}): Promise<TestServices> {
  const db = options.db ?? new Database(':memory:');
  runMigrations(db);
  const models = initModels(db);
  const registry = await initializeServices({
    db,
    models,
    cipherKey: options.cipherKey ?? null,
    remote: options.remote ?? null,
    retry: { maxAttempts: 3, baseDelayMs: 10, maxDelayMs: 40, sleep: async () => {} },
    now: options.now,
  });
  return { ...registry, db, models };
}
