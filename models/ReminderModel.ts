import type Database from 'better-sqlite3';
import { BaseModel } from './BaseModel';
import { logger } from '../utils/logger';
import type { Reminder } from '../shared/types';

interface ReminderRecord {
  note_id: string;
  due_at: string;
  local_time: string;
  timezone: string;
  acknowledged_at: string | null;
  created_at: string;
}

function mapRecordToReminder(record: ReminderRecord): Reminder {
  return {
    noteId: record.note_id,
    dueAt: record.due_at,
    localTime: record.local_time,
    timezone: record.timezone,
    acknowledgedAt: record.acknowledged_at,
    createdAt: record.created_at,
  };
}

export class ReminderModel extends BaseModel {
  protected readonly modelName = 'ReminderModel';

  constructor(db: Database.Database) {
    super(db);
  }

  /**
   * Creates or replaces the reminder of a note. Replacing clears any earlier
   * acknowledgement.
   */
  upsert(params: { noteId: string; dueAt: string; localTime: string; timezone: string; createdAt: string }): Reminder {
    try {
      this.db.prepare(`
        INSERT INTO reminders (note_id, due_at, local_time, timezone, acknowledged_at, created_at)
        VALUES ($noteId, $dueAt, $localTime, $timezone, NULL, $createdAt)
        ON CONFLICT(note_id) DO UPDATE SET
          due_at = excluded.due_at,
          local_time = excluded.local_time,
          timezone = excluded.timezone,
          acknowledged_at = NULL,
          created_at = excluded.created_at
      `).run(params);
    } catch (error) {
      this.handleDbError(error, 'upsert');
    }

    logger.debug('[ReminderModel] Saved reminder', { noteId: params.noteId, dueAt: params.dueAt });

    const saved = this.getByNoteId(params.noteId);
    if (!saved) {
      throw new Error(`Failed to retrieve saved reminder for note: ${params.noteId}`);
    }
    return saved;
  }

  getByNoteId(noteId: string): Reminder | null {
    const record = this.db.prepare('SELECT * FROM reminders WHERE note_id = ?').get(noteId) as ReminderRecord | undefined;
    return record ? mapRecordToReminder(record) : null;
  }

  getAll(): Reminder[] {
    const records = this.db.prepare('SELECT * FROM reminders ORDER BY due_at ASC').all() as ReminderRecord[];
    return records.map(mapRecordToReminder);
  }

  /**
   * Unacknowledged reminders due at or before `nowIso`, oldest first.
   * Timestamps are all `toISOString()` output, so string order is time order.
   */
  getDue(nowIso: string): Reminder[] {
    const records = this.db.prepare(`
      SELECT * FROM reminders
      WHERE acknowledged_at IS NULL AND due_at <= ?
      ORDER BY due_at ASC
    `).all(nowIso) as ReminderRecord[];
    return records.map(mapRecordToReminder);
  }

  /**
   * Unacknowledged reminders due after `nowIso`, soonest first.
   */
  getUpcoming(nowIso: string): Reminder[] {
    const records = this.db.prepare(`
      SELECT * FROM reminders
      WHERE acknowledged_at IS NULL AND due_at > ?
      ORDER BY due_at ASC
    `).all(nowIso) as ReminderRecord[];
    return records.map(mapRecordToReminder);
  }

  acknowledge(noteId: string, acknowledgedAt: string): boolean {
    try {
      const result = this.db.prepare('UPDATE reminders SET acknowledged_at = ? WHERE note_id = ?').run(acknowledgedAt, noteId);
      return result.changes > 0;
    } catch (error) {
      this.handleDbError(error, 'acknowledge');
    }
  }

  delete(noteId: string): boolean {
    try {
      const result = this.db.prepare('DELETE FROM reminders WHERE note_id = ?').run(noteId);
      return result.changes > 0;
    } catch (error) {
      this.handleDbError(error, 'delete');
    }
  }
}
