import { describe, it, expect } from 'vitest';
import { reconcile } from '../reconcile';
import type { LocalRevision, Note, RemoteRevision, SyncState } from '../../../shared/types';

const ID = 'note-1';

const note: Note = {
  id: ID,
  title: 'Title',
  body: '',
  tags: [],
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-01T00:00:00.000Z',
  reminder: null,
  encrypted: false,
};

const state = (overrides: Partial<SyncState> = {}): SyncState => ({
  noteId: ID,
  remoteRevision: 'rev-1',
  localDirty: false,
  deleted: false,
  lastSyncedAt: '2024-01-01T00:00:00.000Z',
  ...overrides,
});

const local = (present: boolean, syncState: SyncState | null): LocalRevision => ({
  noteId: ID,
  note: present ? note : null,
  state: syncState,
});

const remote = (revision: string | null): RemoteRevision => ({ noteId: ID, revision });

describe('reconcile', () => {
  it.each([
    ['new local note, absent remotely', local(true, null), remote(null), 'local_wins'],
    ['unchanged on both sides', local(true, state()), remote('rev-1'), 'in_sync'],
    ['edited locally only', local(true, state({ localDirty: true })), remote('rev-1'), 'local_wins'],
    ['edited remotely only', local(true, state()), remote('rev-2'), 'remote_wins'],
    ['edited on both sides', local(true, state({ localDirty: true })), remote('rev-2'), 'conflict'],
    ['deleted locally only', local(false, state({ localDirty: true, deleted: true })), remote('rev-1'), 'local_wins'],
    ['deleted locally, edited remotely', local(false, state({ localDirty: true, deleted: true })), remote('rev-2'), 'conflict'],
    ['deleted remotely only', local(true, state()), remote(null), 'remote_wins'],
    ['edited locally, deleted remotely', local(true, state({ localDirty: true })), remote(null), 'conflict'],
    ['new remote note', local(false, null), remote('rev-7'), 'remote_wins'],
    ['deleted on both sides', local(false, state({ localDirty: true, deleted: true })), remote(null), 'in_sync'],
  ] as const)('%s -> %s', (_label, localSide, remoteSide, expected) => {
    expect(reconcile(localSide, remoteSide).kind).toBe(expected);
  });

  it('should carry both sides on a conflict', () => {
    const localSide = local(true, state({ localDirty: true }));
    const remoteSide = remote('rev-2');

    expect(reconcile(localSide, remoteSide)).toEqual({ kind: 'conflict', local: localSide, remote: remoteSide });
  });

  it('should refuse to compare different notes', () => {
    expect(() => reconcile(local(true, null), { noteId: 'other', revision: null })).toThrow('Cannot reconcile different notes');
  });
});
