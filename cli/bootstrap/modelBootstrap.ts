import Database from 'better-sqlite3';
import { logger } from '../../utils/logger';
import { NoteModel } from '../../models/NoteModel';
import { ReminderModel } from '../../models/ReminderModel';
import { SyncStateModel } from '../../models/SyncStateModel';

/**
 * Registry of all database models
 */
export interface ModelRegistry {
  noteModel: NoteModel;
  reminderModel: ReminderModel;
  syncStateModel: SyncStateModel;
}

/**
 * Initialize all database models. The connection must already be migrated.
 */
export default function initModels(db: Database.Database): ModelRegistry {
  logger.debug('[ModelBootstrap] Initializing models...');

  const noteModel = new NoteModel(db);
  const reminderModel = new ReminderModel(db);
  const syncStateModel = new SyncStateModel(db);

  return { noteModel, reminderModel, syncStateModel };
}
