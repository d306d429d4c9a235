import type Database from 'better-sqlite3';
import { BaseModel } from './BaseModel';
import { logger } from '../utils/logger';
import type { SyncState } from '../shared/types';

interface SyncStateRecord {
  note_id: string;
  remote_revision: string | null;
  local_dirty: number;
  deleted: number;
  last_synced_at: string | null;
}

interface ConflictRecord {
  note_id: string;
  remote_revision: string | null;
  remote_content: string | null;
  detected_at: string;
}

/** A stored conflict before the remote content is decoded. */
export interface StoredConflict {
  noteId: string;
  remoteRevision: string | null;
  remoteContent: string | null;
  detectedAt: string;
}

function mapRecordToSyncState(record: SyncStateRecord): SyncState {
  return {
    noteId: record.note_id,
    remoteRevision: record.remote_revision,
    localDirty: record.local_dirty === 1,
    deleted: record.deleted === 1,
    lastSyncedAt: record.last_synced_at,
  };
}

function mapRecordToConflict(record: ConflictRecord): StoredConflict {
  return {
    noteId: record.note_id,
    remoteRevision: record.remote_revision,
    remoteContent: record.remote_content,
    detectedAt: record.detected_at,
  };
}

/**
 * Sync markers and conflict records. Never touches note content.
 */
export class SyncStateModel extends BaseModel {
  protected readonly modelName = 'SyncStateModel';

  constructor(db: Database.Database) {
    super(db);
  }

  get(noteId: string): SyncState | null {
    const record = this.db.prepare('SELECT * FROM sync_state WHERE note_id = ?').get(noteId) as SyncStateRecord | undefined;
    return record ? mapRecordToSyncState(record) : null;
  }

  getAll(): SyncState[] {
    const records = this.db.prepare('SELECT * FROM sync_state ORDER BY note_id ASC').all() as SyncStateRecord[];
    return records.map(mapRecordToSyncState);
  }

  /**
   * Flags a note as changed locally since the last sync.
   */
  markDirty(noteId: string): void {
    try {
      this.db.prepare(`
        INSERT INTO sync_state (note_id, remote_revision, local_dirty, deleted, last_synced_at)
        VALUES (?, NULL, 1, 0, NULL)
        ON CONFLICT(note_id) DO UPDATE SET local_dirty = 1, deleted = 0
      `).run(noteId);
    } catch (error) {
      this.handleDbError(error, 'markDirty');
    }
  }

  /**
   * Records a local deletion. A note that never reached the remote has
   * nothing to delete there, so its marker is simply dropped.
   */
  markDeleted(noteId: string): void {
    const existing = this.get(noteId);
    if (!existing || existing.remoteRevision === null) {
      this.remove(noteId);
      return;
    }
    try {
      this.db.prepare('UPDATE sync_state SET local_dirty = 1, deleted = 1 WHERE note_id = ?').run(noteId);
    } catch (error) {
      this.handleDbError(error, 'markDeleted');
    }
  }

  /**
   * Records that local and remote agree at `remoteRevision`.
   */
  markSynced(noteId: string, remoteRevision: string, syncedAt: string): SyncState {
    try {
      this.db.prepare(`
        INSERT INTO sync_state (note_id, remote_revision, local_dirty, deleted, last_synced_at)
        VALUES ($noteId, $remoteRevision, 0, 0, $syncedAt)
        ON CONFLICT(note_id) DO UPDATE SET
          remote_revision = excluded.remote_revision,
          local_dirty = 0,
          deleted = 0,
          last_synced_at = excluded.last_synced_at
      `).run({ noteId, remoteRevision, syncedAt });
    } catch (error) {
      this.handleDbError(error, 'markSynced');
    }
    logger.debug('[SyncStateModel] Marked synced', { noteId, remoteRevision });
    return { noteId, remoteRevision, localDirty: false, deleted: false, lastSyncedAt: syncedAt };
  }

  remove(noteId: string): void {
    try {
      this.db.prepare('DELETE FROM sync_state WHERE note_id = ?').run(noteId);
    } catch (error) {
      this.handleDbError(error, 'remove');
    }
  }

  saveConflict(conflict: StoredConflict): void {
    try {
      this.db.prepare(`
        INSERT INTO sync_conflicts (note_id, remote_revision, remote_content, detected_at)
        VALUES ($noteId, $remoteRevision, $remoteContent, $detectedAt)
        ON CONFLICT(note_id) DO UPDATE SET
          remote_revision = excluded.remote_revision,
          remote_content = excluded.remote_content,
          detected_at = excluded.detected_at
      `).run(conflict);
    } catch (error) {
      this.handleDbError(error, 'saveConflict');
    }
  }

  getConflict(noteId: string): StoredConflict | null {
    const record = this.db.prepare('SELECT * FROM sync_conflicts WHERE note_id = ?').get(noteId) as ConflictRecord | undefined;
    return record ? mapRecordToConflict(record) : null;
  }

  getConflicts(): StoredConflict[] {
    const records = this.db.prepare('SELECT * FROM sync_conflicts ORDER BY detected_at ASC, note_id ASC').all() as ConflictRecord[];
    return records.map(mapRecordToConflict);
  }

  clearConflict(noteId: string): void {
    try {
      this.db.prepare('DELETE FROM sync_conflicts WHERE note_id = ?').run(noteId);
    } catch (error) {
      this.handleDbError(error, 'clearConflict');
    }
  }
}
