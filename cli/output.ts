import type { DueReminder, Note, NoteSnapshot, SyncConflict, SyncReport } from '../shared/types';
import { formatInZone } from '../utils/timezone';

export const SHORT_ID_LENGTH = 8;

export const shortId = (id: string) => id.slice(0, SHORT_ID_LENGTH);

const formatTags = (tags: readonly string[]) => (tags.length > 0 ? tags.map(tag => `#${tag}`).join(' ') : '');

/**
 * One line per note: short id, title, tags, modified time.
 */
export function formatNoteLine(note: Note, timezone: string): string {
  const parts = [shortId(note.id), note.title];
  const tags = formatTags(note.tags);
  if (tags) {
    parts.push(tags);
  }
  parts.push(`(modified ${formatInZone(note.updatedAt, timezone)})`);
  if (note.reminder && !note.reminder.acknowledgedAt) {
    parts.push(`[reminder ${formatInZone(note.reminder.dueAt, timezone)}]`);
  }
  return parts.join('  ');
}

export function formatNoteList(notes: readonly Note[], timezone: string): string[] {
  if (notes.length === 0) {
    return ['No notes found.'];
  }
  return notes.map(note => formatNoteLine(note, timezone));
}

/**
 * Full view of a single note.
 */
export function formatNoteDetail(note: Note, timezone: string): string[] {
  const lines = [
    `Title:    ${note.title}`,
    `Id:       ${note.id}`,
    `Created:  ${formatInZone(note.createdAt, timezone)}`,
    `Modified: ${formatInZone(note.updatedAt, timezone)}`,
    `Tags:     ${note.tags.length > 0 ? note.tags.join(', ') : '(none)'}`,
  ];
  if (note.reminder) {
    const state = note.reminder.acknowledgedAt ? ' (acknowledged)' : '';
    lines.push(`Reminder: ${formatInZone(note.reminder.dueAt, timezone)}${state}`);
  }
  if (note.encrypted) {
    lines.push('Stored:   encrypted');
  }
  lines.push('', note.body);
  return lines;
}

export function formatReminderLine(reminder: DueReminder, timezone: string): string {
  const title = reminder.title ?? '(deleted note)';
  return `${shortId(reminder.noteId)}  ${title}  due ${formatInZone(reminder.dueAt, timezone)}`;
}

/**
 * Banner printed when reminders are due. Empty when none are.
 */
export function formatDueBanner(due: readonly DueReminder[], timezone: string): string[] {
  if (due.length === 0) {
    return [];
  }
  return [
    `*** ${due.length} reminder(s) due ***`,
    ...due.map(reminder => `  ${formatReminderLine(reminder, timezone)}`),
    "  (acknowledge with 'notetaker ack <id>')",
  ];
}

export function formatSyncReport(report: SyncReport): string[] {
  const lines = [
    `Pushed: ${report.pushed.length}`,
    `Pulled: ${report.pulled.length}`,
    `Deleted locally: ${report.deletedLocally.length}`,
    `Deleted remotely: ${report.deletedRemotely.length}`,
  ];
  if (report.conflicts.length > 0) {
    lines.push(`Conflicts: ${report.conflicts.length} (see 'notetaker conflicts')`);
  }
  return lines;
}

function describeSide(label: string, note: NoteSnapshot | null, timezone: string, error: string | null = null): string {
  if (error !== null) {
    return `  ${label}: unreadable (${error})`;
  }
  if (!note) {
    return `  ${label}: deleted`;
  }
  return `  ${label}: "${note.title}" modified ${formatInZone(note.updatedAt, timezone)}`;
}

/**
 * Both sides of a conflict, for the user to choose from.
 */
export function formatConflict(conflict: SyncConflict, local: Note | null, timezone: string): string[] {
  return [
    `${shortId(conflict.noteId)}  detected ${formatInZone(conflict.detectedAt, timezone)}`,
    describeSide('local ', local, timezone),
    describeSide('remote', conflict.remote, timezone, conflict.remoteError),
  ];
}
