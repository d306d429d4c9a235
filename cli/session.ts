import Database from 'better-sqlite3';
import { initDb } from '../models/db';
import { runMigrations } from '../models/runMigrations';
import { AuthenticationError, ValidationError } from '../services/base/ServiceError';
import type { CipherKey } from '../services/crypto/cipher';
import { KeyStore } from '../services/crypto/KeyStore';
import { DropboxRemoteStore } from '../services/sync/DropboxRemoteStore';
import type { RemoteNoteStore } from '../services/sync/RemoteNoteStore';
import type { RuntimeSettings } from '../utils/config';
import { logger } from '../utils/logger';
import initModels from './bootstrap/modelBootstrap';
import { cleanupServices, initializeServices, type ServiceRegistry } from './bootstrap/serviceBootstrap';
import type { CommandIO } from './CommandRegistry';

export type PassphrasePrompt = (question: string) => Promise<string>;

export interface StoreSessionDeps {
  io: CommandIO;
  now: () => Date;
  promptPassphrase: PassphrasePrompt | null;
  createRemote: (settings: RuntimeSettings) => RemoteNoteStore | null;
  sleep?: (ms: number) => Promise<void>;
  kdfIterations?: number;
}

/**
 * Default remote: Dropbox, whenever a token is available.
 */
export function createDropboxRemote(settings: RuntimeSettings): RemoteNoteStore | null {
  if (!settings.dropboxToken) {
    return null;
  }
  return new DropboxRemoteStore({
    accessToken: settings.dropboxToken,
    folder: settings.config.sync.remoteFolder,
    timeoutMs: settings.config.sync.timeoutMs,
  });
}

/**
 * The note store for one CLI invocation, opened on first use so that
 * commands which never touch notes need no passphrase.
 */
export class StoreSession {
  private readonly settings: RuntimeSettings;
  private readonly deps: StoreSessionDeps;
  private db: Database.Database | null = null;
  private registry: ServiceRegistry | null = null;

  constructor(settings: RuntimeSettings, deps: StoreSessionDeps) {
    this.settings = settings;
    this.deps = deps;
  }

  get isOpen(): boolean {
    return this.registry !== null;
  }

  async open(): Promise<ServiceRegistry> {
    if (this.registry) {
      return this.registry;
    }

    const db = initDb(this.settings.dbPath);
    try {
      runMigrations(db);
      const cipherKey = await this.unlock();
      const { maxAttempts, baseDelayMs, maxDelayMs } = this.settings.config.sync;
      const registry = await initializeServices({
        db,
        models: initModels(db),
        cipherKey,
        remote: this.deps.createRemote(this.settings),
        retry: { maxAttempts, baseDelayMs, maxDelayMs, sleep: this.deps.sleep },
        now: this.deps.now,
      });

      if (cipherKey) {
        const encrypted = await registry.note.encryptAll();
        if (encrypted > 0) {
          this.deps.io.err(`Encrypted ${encrypted} existing note(s) at rest.`);
        }
      }

      this.db = db;
      this.registry = registry;
      return registry;
    } catch (error) {
      db.close();
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.registry && this.db) {
      await cleanupServices(this.registry, this.db);
    }
    this.registry = null;
    this.db = null;
  }

  /**
   * A key is needed when encryption is switched on or notes were ever
   * encrypted (the key file exists).
   */
  private async unlock(): Promise<CipherKey | null> {
    const keyStore = new KeyStore({ keyFilePath: this.settings.keyFilePath, iterations: this.deps.kdfIterations });
    const keyFileExists = await keyStore.exists();
    if (!this.settings.config.encrypted && !keyFileExists) {
      return null;
    }
    if (!this.settings.config.encrypted) {
      logger.debug('[StoreSession] Encryption is off in config but a key file exists; unlocking anyway');
    }
    return keyStore.unlock(await this.passphrase(!keyFileExists));
  }

  private async passphrase(creating: boolean): Promise<string> {
    if (this.settings.passphrase !== null) {
      return this.settings.passphrase;
    }
    const prompt = this.deps.promptPassphrase;
    if (!prompt) {
      throw new AuthenticationError('Notes are encrypted: set NOTETAKER_PASSPHRASE or run in a terminal to enter the passphrase');
    }

    const passphrase = await prompt(creating ? 'New passphrase: ' : 'Passphrase: ');
    if (creating && (await prompt('Repeat passphrase: ')) !== passphrase) {
      throw new ValidationError('Passphrases do not match');
    }
    return passphrase;
  }
}
