import type { Reminder } from './reminder.types';

/** Fields of a note that `search` can match against. */
export type NoteSearchField = 'title' | 'content' | 'tag';

export const ALL_SEARCH_FIELDS: readonly NoteSearchField[] = ['title', 'content', 'tag'];

/** Represents a single note. */
export interface Note {
  id: string; // UUID v4, immutable
  title: string;
  body: string; // Markdown
  tags: string[];
  createdAt: string; // ISO 8601 timestamp (UTC)
  updatedAt: string; // ISO 8601 timestamp (UTC), strictly increasing per note
  reminder: Reminder | null;
  encrypted: boolean;
}

/** A note without its local-only parts, as exchanged with the remote. */
export type NoteSnapshot = Omit<Note, 'reminder' | 'encrypted'>;

/** Payload for updating a note. Omitted fields keep their value. */
export interface UpdateNotePayload {
  title?: string;
  body?: string;
  tags?: string[];
}

/** The fields that are encrypted together when encryption is on. */
export interface NoteContent {
  title: string;
  body: string;
  tags: string[];
}
