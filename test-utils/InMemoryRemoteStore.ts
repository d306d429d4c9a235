import { RemoteRevisionConflictError } from '../services/base/ServiceError';
import type { RemoteNoteStore } from '../services/sync/RemoteNoteStore';
import type { RemoteEntry, RemoteObject } from '../shared/types';

type RemoteCall = 'list' | 'download' | 'upload' | 'remove';

interface StoredFile {
  revision: string;
  content: string;
}

/**
 * In-process stand-in for the Dropbox store, with the same conditional
 * write semantics. `put`/`delete` play the part of another device.
 */
export class InMemoryRemoteStore implements RemoteNoteStore {
  readonly name = 'memory';
  readonly calls: Array<{ call: RemoteCall; noteId?: string }> = [];
  private readonly files = new Map<string, StoredFile>();
  private counter = 0;
  private failures: Array<{ error: Error; remaining: number }> = [];

  /** The next `times` calls, of any kind, reject with `error`. */
  failNext(error: Error, times = 1): void {
    this.failures.push({ error, remaining: times });
  }

  async list(): Promise<RemoteEntry[]> {
    this.record('list');
    return [...this.files.entries()].map(([noteId, file]) => ({ noteId, revision: file.revision }));
  }

  async download(noteId: string): Promise<RemoteObject | null> {
    this.record('download', noteId);
    const file = this.files.get(noteId);
    return file ? { noteId, revision: file.revision, content: file.content } : null;
  }

  async upload(noteId: string, content: string, expectedRevision: string | null): Promise<string> {
    this.record('upload', noteId);
    const current = this.files.get(noteId);
    if ((current?.revision ?? null) !== expectedRevision) {
      throw new RemoteRevisionConflictError(noteId, expectedRevision);
    }
    return this.put(noteId, content);
  }

  async remove(noteId: string, expectedRevision: string): Promise<void> {
    this.record('remove', noteId);
    const current = this.files.get(noteId);
    if (!current) {
      return;
    }
    if (current.revision !== expectedRevision) {
      throw new RemoteRevisionConflictError(noteId, expectedRevision);
    }
    this.files.delete(noteId);
  }

  put(noteId: string, content: string): string {
    const revision = `rev-${++this.counter}`;
    this.files.set(noteId, { revision, content });
    return revision;
  }

  delete(noteId: string): void {
    this.files.delete(noteId);
  }

  get(noteId: string): StoredFile | undefined {
    return this.files.get(noteId);
  }

  callsOf(call: RemoteCall): number {
    return this.calls.filter(entry => entry.call === call).length;
  }

  private record(call: RemoteCall, noteId?: string): void {
    this.calls.push({ call, noteId });
    const failure = this.failures[0];
    if (failure) {
      failure.remaining -= 1;
      if (failure.remaining <= 0) {
        this.failures.shift();
      }
      throw failure.error;
    }
  }
}
