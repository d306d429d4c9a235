import type { Note, NoteSnapshot } from './notes.types';

/** Per-note synchronisation marker. */
export interface SyncState {
  noteId: string;
  remoteRevision: string | null; // revision of the last common version
  localDirty: boolean;
  deleted: boolean; // local tombstone waiting to be pushed
  lastSyncedAt: string | null;
}

/** A remote file as listed by the remote store. */
export interface RemoteEntry {
  noteId: string;
  revision: string;
}

/** Content plus revision as downloaded from the remote store. */
export interface RemoteObject {
  noteId: string;
  revision: string;
  content: string;
}

/** Local view of a note handed to `reconcile`. */
export interface LocalRevision {
  noteId: string;
  note: Note | null; // null when deleted locally
  state: SyncState | null; // null when never synced
}

/** Remote view of a note handed to `reconcile`. */
export interface RemoteRevision {
  noteId: string;
  revision: string | null; // null when absent remotely
}

export type Resolution =
  | { kind: 'in_sync' }
  | { kind: 'local_wins' }
  | { kind: 'remote_wins' }
  | { kind: 'conflict'; local: LocalRevision; remote: RemoteRevision };

/** The remote side of a detected conflict, held until the user picks a side. */
export interface SyncConflict {
  noteId: string;
  remoteRevision: string | null;
  remote: NoteSnapshot | null; // null when deleted remotely or unreadable
  remoteError: string | null; // why the remote copy could not be decoded
  detectedAt: string;
}

export type ConflictChoice = 'local' | 'remote';

export interface PulledNote {
  note: NoteSnapshot;
  state: SyncState;
}

/** Summary of a full synchronisation pass. */
export interface SyncReport {
  pushed: string[];
  pulled: string[];
  deletedLocally: string[];
  deletedRemotely: string[];
  conflicts: SyncConflict[];
}
