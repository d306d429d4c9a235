import Database from 'better-sqlite3';
import { logger } from '../../utils/logger';
import type { RetryOptions } from '../../utils/retry';
import type { CipherKey } from '../../services/crypto/cipher';
import type { RemoteNoteStore } from '../../services/sync/RemoteNoteStore';
import type { ModelRegistry } from './modelBootstrap';

// Services
import { NoteService } from '../../services/NoteService';
import { ReminderService } from '../../services/ReminderService';
import { ExportService } from '../../services/ExportService';
import { SyncService } from '../../services/sync/SyncService';

/**
 * Service registry to manage all application services
 */
export interface ServiceRegistry {
  note: NoteService;
  reminder: ReminderService;
  export: ExportService;
  sync: SyncService | null; // null when no remote is configured
}

/**
 * Dependencies required to initialize services
 */
export interface ServiceInitDependencies {
  db: Database.Database;
  models: ModelRegistry;
  cipherKey: CipherKey | null;
  remote: RemoteNoteStore | null;
  retry: RetryOptions;
  now?: () => Date;
}

/**
 * Creates every service and opens the note store. Fails with
 * DecryptionError if stored notes cannot be read with `cipherKey`.
 */
export async function initializeServices(deps: ServiceInitDependencies): Promise<ServiceRegistry> {
  logger.debug('[ServiceBootstrap] Starting service initialization...');
  const { db, models, now } = deps;

  const note = new NoteService({
    db,
    noteModel: models.noteModel,
    reminderModel: models.reminderModel,
    syncStateModel: models.syncStateModel,
    cipherKey: deps.cipherKey,
    now,
  });
  await note.initialize();

  const reminder = new ReminderService({ db, reminderModel: models.reminderModel, noteService: note, now });
  await reminder.initialize();

  const sync = deps.remote
    ? new SyncService({
        db,
        noteService: note,
        syncStateModel: models.syncStateModel,
        remote: deps.remote,
        retry: deps.retry,
        now,
      })
    : null;

  logger.debug(`[ServiceBootstrap] Services ready (remote: ${deps.remote ? deps.remote.name : 'none'})`);
  return { note, reminder, export: new ExportService(), sync };
}

/**
 * Cleans up services in reverse order of dependency, then closes the
 * connection.
 */
export async function cleanupServices(registry: ServiceRegistry, db: Database.Database): Promise<void> {
  const servicesToCleanup = [registry.sync, registry.reminder, registry.note];

  for (const service of servicesToCleanup) {
    if (!service) {
      continue;
    }
    try {
      await service.cleanup();
    } catch (error) {
      logger.error(`[ServiceBootstrap] Failed to cleanup ${service.constructor.name}:`, error);
    }
  }

  db.close();
  logger.debug('[ServiceBootstrap] Service cleanup complete');
}
