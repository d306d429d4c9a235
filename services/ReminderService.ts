import type Database from 'better-sqlite3';
import { BaseService } from './base/BaseService';
import { NotFoundError } from './base/ServiceError';
import { ReminderModel } from '../models/ReminderModel';
import { NoteService } from './NoteService';
import type { DueReminder, Reminder } from '../shared/types';
import { assertTimezone, localTimeToUtc, normalizeLocalTime } from '../utils/timezone';

interface ReminderServiceDeps {
  db: Database.Database;
  reminderModel: ReminderModel;
  noteService: NoteService;
  now?: () => Date;
}

/**
 * Reminder scheduling. There is no timer: the CLI polls `dueNow` on every
 * invocation, so a reminder fires the first time the tool runs after its
 * due time.
 */
export class ReminderService extends BaseService<ReminderServiceDeps> {
  constructor(deps: ReminderServiceDeps) {
    super('ReminderService', deps);
  }

  /**
   * Sets (or replaces) the reminder of a note. `dueAtLocal` is wall-clock
   * time in `timezone` and is stored as UTC.
   */
  async schedule(noteId: string, dueAtLocal: string, timezone: string): Promise<Reminder> {
    return this.execute('schedule', async () => {
      if (!this.deps.noteService.has(noteId)) {
        throw new NotFoundError('Note', noteId);
      }
      const localTime = normalizeLocalTime(dueAtLocal);
      const zone = assertTimezone(timezone);
      const dueAt = localTimeToUtc(localTime, zone).toISOString();

      const reminder = this.withTransaction(this.deps.db, () => this.deps.reminderModel.upsert({
        noteId,
        dueAt,
        localTime,
        timezone: zone,
        createdAt: this.now().toISOString(),
      }));

      this.logInfo('Scheduled reminder', { noteId, dueAt });
      return reminder;
    }, { noteId, dueAtLocal, timezone });
  }

  /**
   * Every unacknowledged reminder whose due time has passed, oldest first.
   */
  dueNow(now: Date = this.now()): DueReminder[] {
    return this.deps.reminderModel.getDue(now.toISOString()).map(reminder => this.withTitle(reminder));
  }

  /**
   * Unacknowledged reminders still in the future, soonest first.
   */
  upcoming(now: Date = this.now()): DueReminder[] {
    return this.deps.reminderModel.getUpcoming(now.toISOString()).map(reminder => this.withTitle(reminder));
  }

  get(noteId: string): Reminder | null {
    return this.deps.reminderModel.getByNoteId(noteId);
  }

  /**
   * Marks a reminder as handled so `dueNow` stops returning it.
   */
  async acknowledge(noteId: string): Promise<void> {
    return this.execute('acknowledge', async () => {
      const acknowledged = this.withTransaction(this.deps.db, () =>
        this.deps.reminderModel.acknowledge(noteId, this.now().toISOString())
      );
      if (!acknowledged) {
        throw new NotFoundError('Reminder for note', noteId);
      }
    }, { noteId });
  }

  async clear(noteId: string): Promise<void> {
    return this.execute('clear', async () => {
      const removed = this.withTransaction(this.deps.db, () => this.deps.reminderModel.delete(noteId));
      if (!removed) {
        throw new NotFoundError('Reminder for note', noteId);
      }
    }, { noteId });
  }

  private withTitle(reminder: Reminder): DueReminder {
    const title = this.deps.noteService.has(reminder.noteId)
      ? this.deps.noteService.get(reminder.noteId).title
      : null;
    return { ...reminder, title };
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }
}
