/** A reminder attached to a note. */
export interface Reminder {
  noteId: string;
  dueAt: string; // ISO 8601 timestamp, normalised to UTC
  localTime: string; // wall-clock time as entered, YYYY-MM-DDTHH:mm
  timezone: string; // IANA identifier the local time was entered in
  acknowledgedAt: string | null;
  createdAt: string;
}

/** A due reminder together with the title of its note, for display. */
export interface DueReminder extends Reminder {
  title: string | null;
}
