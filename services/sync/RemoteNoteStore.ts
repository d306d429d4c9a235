import type { RemoteEntry, RemoteObject } from '../../shared/types';

/**
 * A blob store keyed by note id with a revision tag per blob. Conditional
 * writes and deletes raise RemoteRevisionConflictError when the remote is
 * no longer at `expectedRevision` (null meaning "must not exist yet").
 */
export interface RemoteNoteStore {
  readonly name: string;
  list(): Promise<RemoteEntry[]>;
  /** Resolves to null when the note is absent remotely. */
  download(noteId: string): Promise<RemoteObject | null>;
  /** Returns the new revision. */
  upload(noteId: string, content: string, expectedRevision: string | null): Promise<string>;
  remove(noteId: string, expectedRevision: string): Promise<void>;
}
