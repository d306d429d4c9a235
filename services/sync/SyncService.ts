import type Database from 'better-sqlite3';
import { BaseService } from '../base/BaseService';
import { ConflictError, DecryptionError, NotFoundError, RemoteRevisionConflictError, ValidationError } from '../base/ServiceError';
import { NoteService } from '../NoteService';
import { SyncStateModel, type StoredConflict } from '../../models/SyncStateModel';
import { RemoteNoteDocumentSchema } from '../../shared/schemas/noteSchemas';
import type {
  ConflictChoice,
  LocalRevision,
  Note,
  NoteSnapshot,
  PulledNote,
  RemoteObject,
  SyncConflict,
  SyncReport,
  SyncState,
} from '../../shared/types';
import { withRetry, type RetryOptions } from '../../utils/retry';
import { validatePayload } from '../../utils/validatePayload';
import type { RemoteNoteStore } from './RemoteNoteStore';
import { reconcile } from './reconcile';

interface SyncServiceDeps {
  db: Database.Database;
  noteService: NoteService;
  syncStateModel: SyncStateModel;
  remote: RemoteNoteStore;
  retry: RetryOptions;
  now?: () => Date;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Keeps the local note store and a RemoteNoteStore in step. Only sync
 * markers and conflict records are written here; note content changes go
 * through NoteService.applyRemote / applyRemoteDeletion.
 */
export class SyncService extends BaseService<SyncServiceDeps> {
  constructor(deps: SyncServiceDeps) {
    super('SyncService', deps);
  }

  /**
   * Uploads one note, guarded by the revision it was last synced at. If the
   * remote copy moved in the meantime the conflict is recorded and
   * ConflictError thrown.
   */
  async push(note: Note): Promise<SyncState> {
    return this.execute('push', async () => {
      const expectedRevision = this.deps.syncStateModel.get(note.id)?.remoteRevision ?? null;
      const content = JSON.stringify(this.deps.noteService.toDocument(note));

      let revision: string;
      try {
        revision = await this.remoteCall('upload', () => this.deps.remote.upload(note.id, content, expectedRevision));
      } catch (error) {
        if (error instanceof RemoteRevisionConflictError) {
          await this.recordConflict(note.id);
          throw new ConflictError(note.id, 'changed remotely since the last sync');
        }
        throw error;
      }

      return this.withTransaction(this.deps.db, () =>
        this.deps.syncStateModel.markSynced(note.id, revision, this.now().toISOString())
      );
    }, { noteId: note.id });
  }

  /**
   * Downloads every remote note whose revision differs from the local marker.
   * Nothing is applied; each entry carries the marker the note would have
   * once adopted.
   */
  async pull(): Promise<PulledNote[]> {
    return this.execute('pull', async () => {
      const entries = await this.remoteCall('list', () => this.deps.remote.list());
      const pulled: PulledNote[] = [];

      for (const entry of entries) {
        const local = this.deps.syncStateModel.get(entry.noteId);
        if (local?.remoteRevision === entry.revision) {
          continue;
        }
        const object = await this.download(entry.noteId);
        if (!object) {
          continue;
        }
        pulled.push({
          note: this.decodeRemote(object.noteId, object.content),
          state: {
            noteId: object.noteId,
            remoteRevision: object.revision,
            localDirty: false,
            deleted: false,
            lastSyncedAt: this.now().toISOString(),
          },
        });
      }

      this.logInfo(`Pulled ${pulled.length} changed note(s)`);
      return pulled;
    });
  }

  /**
   * Reconciles every note known on either side and applies the outcome.
   * Conflicts are recorded, never settled automatically; notes with an
   * unresolved conflict are left alone until the user resolves it.
   */
  async synchronize(): Promise<SyncReport> {
    return this.execute('synchronize', async () => {
      const report: SyncReport = { pushed: [], pulled: [], deletedLocally: [], deletedRemotely: [], conflicts: [] };

      const entries = await this.remoteCall('list', () => this.deps.remote.list());
      const remoteRevisions = new Map(entries.map(entry => [entry.noteId, entry.revision]));
      const states = new Map(this.deps.syncStateModel.getAll().map(state => [state.noteId, state]));
      const pending = new Set(this.deps.syncStateModel.getConflicts().map(conflict => conflict.noteId));

      const noteIds = new Set<string>([
        ...this.deps.noteService.list().map(note => note.id),
        ...states.keys(),
        ...remoteRevisions.keys(),
      ]);

      for (const noteId of noteIds) {
        if (pending.has(noteId)) {
          continue;
        }
        const local: LocalRevision = {
          noteId,
          note: this.deps.noteService.has(noteId) ? this.deps.noteService.get(noteId) : null,
          state: states.get(noteId) ?? null,
        };
        const remoteRevision = remoteRevisions.get(noteId) ?? null;
        const resolution = reconcile(local, { noteId, revision: remoteRevision });

        switch (resolution.kind) {
          case 'in_sync':
            if (local.note === null && local.state) {
              this.deps.syncStateModel.remove(noteId);
            }
            break;

          case 'local_wins':
            if (local.note) {
              try {
                await this.push(local.note);
                report.pushed.push(noteId);
              } catch (error) {
                if (!(error instanceof ConflictError)) {
                  throw error;
                }
              }
            } else if (remoteRevision !== null) {
              if (await this.pushDeletion(noteId, remoteRevision)) {
                report.deletedRemotely.push(noteId);
              }
            }
            break;

          case 'remote_wins':
            if (await this.adoptRemote(noteId, remoteRevision)) {
              report.pulled.push(noteId);
            } else {
              report.deletedLocally.push(noteId);
            }
            break;

          case 'conflict':
            await this.recordConflict(noteId);
            break;
        }
      }

      report.conflicts = this.listConflicts();
      this.logInfo('Synchronization finished', {
        pushed: report.pushed.length,
        pulled: report.pulled.length,
        deletedLocally: report.deletedLocally.length,
        deletedRemotely: report.deletedRemotely.length,
        conflicts: report.conflicts.length,
      });
      return report;
    });
  }

  /**
   * Unresolved conflicts, oldest first, with the remote side decoded. A
   * remote copy that cannot be decoded is reported through `remoteError`.
   */
  listConflicts(): SyncConflict[] {
    return this.deps.syncStateModel.getConflicts().map(conflict => this.toSyncConflict(conflict));
  }

  /** Ids of notes with an unresolved conflict. Nothing is decoded. */
  listConflictIds(): string[] {
    return this.deps.syncStateModel.getConflicts().map(conflict => conflict.noteId);
  }

  /**
   * Settles a recorded conflict by keeping one side and overwriting the other.
   */
  async resolveConflict(noteId: string, keep: ConflictChoice): Promise<void> {
    return this.execute('resolveConflict', async () => {
      const conflict = this.deps.syncStateModel.getConflict(noteId);
      if (!conflict) {
        throw new NotFoundError('Conflict for note', noteId);
      }

      if (keep === 'local') {
        await this.keepLocal(conflict);
      } else {
        await this.keepRemote(conflict);
      }

      this.withTransaction(this.deps.db, () => this.deps.syncStateModel.clearConflict(noteId));
      this.logInfo('Resolved conflict', { noteId, keep });
    }, { noteId, keep });
  }

  private async keepLocal(conflict: StoredConflict): Promise<void> {
    const { noteId, remoteRevision } = conflict;

    if (!this.deps.noteService.has(noteId)) {
      if (remoteRevision !== null) {
        await this.removeGuarded(noteId, remoteRevision);
      }
      this.deps.syncStateModel.remove(noteId);
      return;
    }

    const note = this.deps.noteService.get(noteId);
    const content = JSON.stringify(this.deps.noteService.toDocument(note));
    let revision: string;
    try {
      revision = await this.remoteCall('upload', () => this.deps.remote.upload(noteId, content, remoteRevision));
    } catch (error) {
      if (error instanceof RemoteRevisionConflictError) {
        await this.recordConflict(noteId);
        throw new ConflictError(noteId, 'changed remotely again while resolving');
      }
      throw error;
    }
    this.withTransaction(this.deps.db, () =>
      this.deps.syncStateModel.markSynced(noteId, revision, this.now().toISOString())
    );
  }

  private async keepRemote(conflict: StoredConflict): Promise<void> {
    const { noteId, remoteRevision, remoteContent } = conflict;

    if (remoteRevision === null || remoteContent === null) {
      if (this.deps.noteService.has(noteId)) {
        await this.deps.noteService.applyRemoteDeletion(noteId);
      }
      this.deps.syncStateModel.remove(noteId);
      return;
    }

    let snapshot: NoteSnapshot;
    try {
      snapshot = this.decodeRemote(noteId, remoteContent);
    } catch (error) {
      if (error instanceof ValidationError || error instanceof DecryptionError) {
        throw new ValidationError(`Cannot keep the remote copy of note '${noteId}': ${error.message}`, { noteId });
      }
      throw error;
    }

    await this.deps.noteService.applyRemote(snapshot);
    this.withTransaction(this.deps.db, () =>
      this.deps.syncStateModel.markSynced(noteId, remoteRevision, this.now().toISOString())
    );
  }

  /**
   * Deletes the remote copy of a tombstoned note.
   * @returns false when the remote changed first and a conflict was recorded
   */
  private async pushDeletion(noteId: string, expectedRevision: string): Promise<boolean> {
    try {
      await this.removeGuarded(noteId, expectedRevision);
    } catch (error) {
      if (error instanceof ConflictError) {
        return false;
      }
      throw error;
    }
    this.deps.syncStateModel.remove(noteId);
    return true;
  }

  private async removeGuarded(noteId: string, expectedRevision: string): Promise<void> {
    try {
      await this.remoteCall('remove', () => this.deps.remote.remove(noteId, expectedRevision));
    } catch (error) {
      if (error instanceof RemoteRevisionConflictError) {
        await this.recordConflict(noteId);
        throw new ConflictError(noteId, 'changed remotely before it could be deleted');
      }
      throw error;
    }
  }

  /**
   * Applies the remote side locally.
   * @returns true if a note was adopted, false if it was deleted locally
   */
  private async adoptRemote(noteId: string, remoteRevision: string | null): Promise<boolean> {
    const object = remoteRevision === null ? null : await this.download(noteId);

    if (!object) {
      if (this.deps.noteService.has(noteId)) {
        await this.deps.noteService.applyRemoteDeletion(noteId);
      }
      this.deps.syncStateModel.remove(noteId);
      return false;
    }

    await this.deps.noteService.applyRemote(this.decodeRemote(noteId, object.content));
    this.withTransaction(this.deps.db, () =>
      this.deps.syncStateModel.markSynced(noteId, object.revision, this.now().toISOString())
    );
    return true;
  }

  /**
   * Stores the current remote side of a diverged note.
   */
  private async recordConflict(noteId: string): Promise<void> {
    const object = await this.download(noteId);
    this.withTransaction(this.deps.db, () => this.deps.syncStateModel.saveConflict({
      noteId,
      remoteRevision: object?.revision ?? null,
      remoteContent: object?.content ?? null,
      detectedAt: this.now().toISOString(),
    }));
    this.logWarn('Recorded sync conflict', { noteId });
  }

  private async download(noteId: string): Promise<RemoteObject | null> {
    return this.remoteCall('download', () => this.deps.remote.download(noteId));
  }

  private decodeRemote(noteId: string, content: string): NoteSnapshot {
    const parsed = parseJson(content);
    if (parsed === undefined) {
      throw new ValidationError(`Remote copy of note '${noteId}' is not valid JSON`);
    }
    const document = validatePayload(RemoteNoteDocumentSchema, parsed, `remote copy of note '${noteId}'`);
    if (document.id !== noteId) {
      throw new ValidationError(`Remote file for note '${noteId}' holds note '${document.id}'`);
    }
    return this.deps.noteService.fromDocument(document);
  }

  private toSyncConflict(conflict: StoredConflict): SyncConflict {
    const { noteId, remoteRevision, remoteContent, detectedAt } = conflict;
    if (remoteContent === null) {
      return { noteId, remoteRevision, remote: null, remoteError: null, detectedAt };
    }
    try {
      return { noteId, remoteRevision, remote: this.decodeRemote(noteId, remoteContent), remoteError: null, detectedAt };
    } catch (error) {
      if (error instanceof ValidationError || error instanceof DecryptionError) {
        this.logWarn('Stored remote copy is unreadable', { noteId, error: error.message });
        return { noteId, remoteRevision, remote: null, remoteError: error.message, detectedAt };
      }
      throw error;
    }
  }

  private async remoteCall<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(`${this.deps.remote.name} ${operation}`, fn, this.deps.retry);
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }
}
