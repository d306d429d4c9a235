import { describe, it, expect, beforeEach, vi } from 'vitest';
import { SyncService } from '../SyncService';
import { ConflictError, NotFoundError, SyncUnavailableError, TimeoutError, ValidationError } from '../../base/ServiceError';
import { InMemoryRemoteStore } from '../../../test-utils/InMemoryRemoteStore';
import { createClock, createTestServices, testKey, type TestServices } from '../../../test-utils/services';
import type { CipherKey } from '../../crypto/cipher';

vi.mock('../../../utils/logger', async () => (await import('../../../test-utils/mocks/logger')).mockLoggerModule);

type Device = TestServices & { sync: SyncService };

describe('SyncService', () => {
  let clock: ReturnType<typeof createClock>;
  let remote: InMemoryRemoteStore;

  const device = async (cipherKey: CipherKey | null = null): Promise<Device> => {
    const services = await createTestServices({ remote, cipherKey, now: clock.now });
    if (!services.sync) {
      throw new Error('sync was not configured');
    }
    return { ...services, sync: services.sync };
  };

  beforeEach(() => {
    clock = createClock('2024-06-01T10:00:00.000Z');
    remote = new InMemoryRemoteStore();
  });

  describe('synchronize', () => {
    let laptop: Device;
    let phone: Device;

    beforeEach(async () => {
      laptop = await device();
      phone = await device();
    });

    it('should push a new note with its revision recorded', async () => {
      const note = await laptop.note.create('Groceries', 'Milk', ['home']);

      const report = await laptop.sync.synchronize();

      expect(report).toEqual({ pushed: [note.id], pulled: [], deletedLocally: [], deletedRemotely: [], conflicts: [] });
      expect(JSON.parse(remote.get(note.id)?.content ?? '')).toEqual({
        version: 1,
        id: note.id,
        createdAt: '2024-06-01T10:00:00.000Z',
        updatedAt: '2024-06-01T10:00:00.000Z',
        encrypted: false,
        title: 'Groceries',
        body: 'Milk',
        tags: ['home'],
      });
      expect(laptop.models.syncStateModel.get(note.id)).toEqual({
        noteId: note.id,
        remoteRevision: 'rev-1',
        localDirty: false,
        deleted: false,
        lastSyncedAt: '2024-06-01T10:00:00.000Z',
      });
    });

    it('should pull a note created on another device, keeping its id and timestamps', async () => {
      const note = await laptop.note.create('Groceries', 'Milk', ['home']);
      await laptop.sync.synchronize();

      const report = await phone.sync.synchronize();

      expect(report.pulled).toEqual([note.id]);
      expect(phone.note.get(note.id)).toEqual(note);
    });

    it('should do nothing when both sides agree', async () => {
      await laptop.note.create('Groceries', 'Milk');
      await laptop.sync.synchronize();
      const uploads = remote.callsOf('upload');

      const report = await laptop.sync.synchronize();

      expect(report).toEqual({ pushed: [], pulled: [], deletedLocally: [], deletedRemotely: [], conflicts: [] });
      expect(remote.callsOf('upload')).toBe(uploads);
    });

    it('should carry an edit from one device to the other', async () => {
      const note = await laptop.note.create('Plan', 'draft');
      await laptop.sync.synchronize();
      await phone.sync.synchronize();

      clock.advance(1000);
      await laptop.note.update(note.id, { body: 'final' });
      expect((await laptop.sync.synchronize()).pushed).toEqual([note.id]);

      expect((await phone.sync.synchronize()).pulled).toEqual([note.id]);
      expect(phone.note.get(note.id)).toMatchObject({ body: 'final', updatedAt: '2024-06-01T10:00:01.000Z' });
    });

    it('should carry a deletion from one device to the other', async () => {
      const note = await laptop.note.create('Old', '');
      await laptop.sync.synchronize();
      await phone.sync.synchronize();

      await laptop.note.delete(note.id);
      expect(laptop.models.syncStateModel.get(note.id)).toMatchObject({ deleted: true });

      expect((await laptop.sync.synchronize()).deletedRemotely).toEqual([note.id]);
      expect(remote.get(note.id)).toBeUndefined();
      expect(laptop.models.syncStateModel.get(note.id)).toBeNull();

      expect((await phone.sync.synchronize()).deletedLocally).toEqual([note.id]);
      expect(phone.note.has(note.id)).toBe(false);
      expect(phone.models.syncStateModel.get(note.id)).toBeNull();
    });

    it('should never push a note that was created and deleted before syncing', async () => {
      const note = await laptop.note.create('Scratch', '');
      await laptop.note.delete(note.id);

      await laptop.sync.synchronize();

      expect(remote.callsOf('upload')).toBe(0);
      expect(remote.callsOf('remove')).toBe(0);
    });
  });

  describe('conflicts', () => {
    let laptop: Device;
    let phone: Device;
    let noteId: string;

    beforeEach(async () => {
      laptop = await device();
      phone = await device();
      noteId = (await laptop.note.create('Plan', 'original')).id;
      await laptop.sync.synchronize();
      await phone.sync.synchronize();

      clock.advance(1000);
      await laptop.note.update(noteId, { body: 'laptop edit' });
      await phone.note.update(noteId, { body: 'phone edit' });
      await laptop.sync.synchronize();
    });

    it('should record a conflict when both sides changed, keeping the local copy', async () => {
      const report = await phone.sync.synchronize();

      expect(report.pushed).toEqual([]);
      expect(report.conflicts).toHaveLength(1);
      expect(report.conflicts[0]).toMatchObject({
        noteId,
        remoteRevision: 'rev-2',
        remote: { id: noteId, body: 'laptop edit' },
        detectedAt: '2024-06-01T10:00:01.000Z',
      });
      expect(phone.note.get(noteId).body).toBe('phone edit');
      expect(phone.models.syncStateModel.get(noteId)).toMatchObject({ localDirty: true, remoteRevision: 'rev-1' });
    });

    it('should leave a conflicted note alone on later syncs', async () => {
      await phone.sync.synchronize();
      const calls = remote.calls.length;

      const report = await phone.sync.synchronize();

      expect(report.conflicts.map(conflict => conflict.noteId)).toEqual([noteId]);
      expect(remote.calls.slice(calls).map(entry => entry.call)).toEqual(['list']);
    });

    it('should overwrite the remote when the local copy is kept', async () => {
      await phone.sync.synchronize();

      await phone.sync.resolveConflict(noteId, 'local');

      expect(phone.sync.listConflicts()).toEqual([]);
      expect(JSON.parse(remote.get(noteId)?.content ?? '')).toMatchObject({ body: 'phone edit' });
      expect(phone.models.syncStateModel.get(noteId)).toMatchObject({ localDirty: false, remoteRevision: 'rev-3' });

      await laptop.sync.synchronize();
      expect(laptop.note.get(noteId).body).toBe('phone edit');
    });

    it('should overwrite the local copy when the remote is kept', async () => {
      await phone.sync.synchronize();

      await phone.sync.resolveConflict(noteId, 'remote');

      expect(phone.note.get(noteId).body).toBe('laptop edit');
      expect(phone.models.syncStateModel.get(noteId)).toMatchObject({ localDirty: false, remoteRevision: 'rev-2' });
      expect((await phone.sync.synchronize()).pushed).toEqual([]);
    });

    it('should throw NotFoundError when there is nothing to resolve', async () => {
      await expect(phone.sync.resolveConflict(noteId, 'local')).rejects.toThrow(NotFoundError);
    });
  });

  describe('unreadable remote copy', () => {
    let laptop: Device;
    let noteId: string;

    beforeEach(async () => {
      laptop = await device();
      noteId = (await laptop.note.create('Plan', 'original')).id;
      await laptop.sync.synchronize();

      remote.put(noteId, 'not json from another client');
      await laptop.note.update(noteId, { body: 'local edit' });
    });

    it('should report the conflict with the decoding failure instead of throwing', async () => {
      const report = await laptop.sync.synchronize();

      expect(report.conflicts).toEqual([{
        noteId,
        remoteRevision: 'rev-2',
        remote: null,
        remoteError: `Remote copy of note '${noteId}' is not valid JSON`,
        detectedAt: '2024-06-01T10:00:00.000Z',
      }]);
      await expect(laptop.sync.synchronize()).resolves.toMatchObject({ pushed: [], pulled: [] });
      expect(laptop.sync.listConflictIds()).toEqual([noteId]);
    });

    it('should report a copy sealed under another key as unreadable', async () => {
      const other = await createTestServices({ cipherKey: testKey('test-secret', 9), now: clock.now });
      remote.put(noteId, JSON.stringify(other.note.toDocument(laptop.note.get(noteId))));

      await laptop.sync.synchronize();

      const [conflict] = laptop.sync.listConflicts();
      expect(conflict).toMatchObject({ noteId, remoteRevision: 'rev-3', remote: null });
      expect(conflict.remoteError).toBe('Notes are encrypted: a passphrase is required');
    });

    it('should refuse to keep the unreadable copy but keep the local one', async () => {
      await laptop.sync.synchronize();

      await expect(laptop.sync.resolveConflict(noteId, 'remote')).rejects.toThrow(ValidationError);
      expect(laptop.sync.listConflictIds()).toEqual([noteId]);

      await laptop.sync.resolveConflict(noteId, 'local');

      expect(laptop.sync.listConflicts()).toEqual([]);
      expect(JSON.parse(remote.get(noteId)?.content ?? '')).toMatchObject({ body: 'local edit' });
      expect(laptop.models.syncStateModel.get(noteId)).toMatchObject({ localDirty: false, remoteRevision: 'rev-3' });
    });
  });

  describe('edit against remote deletion', () => {
    let laptop: Device;
    let phone: Device;
    let noteId: string;

    beforeEach(async () => {
      laptop = await device();
      phone = await device();
      noteId = (await laptop.note.create('Shared', 'v1')).id;
      await laptop.sync.synchronize();
      await phone.sync.synchronize();

      await laptop.note.delete(noteId);
      await laptop.sync.synchronize();
      await phone.note.update(noteId, { body: 'v2 from phone' });
    });

    it('should record a conflict with no remote copy', async () => {
      const report = await phone.sync.synchronize();

      expect(report.conflicts).toHaveLength(1);
      expect(report.conflicts[0]).toMatchObject({ noteId, remoteRevision: null, remote: null });
    });

    it('should restore the remote copy when the local edit is kept', async () => {
      await phone.sync.synchronize();
      await phone.sync.resolveConflict(noteId, 'local');

      expect(JSON.parse(remote.get(noteId)?.content ?? '')).toMatchObject({ body: 'v2 from phone' });
    });

    it('should delete the local note when the deletion is kept', async () => {
      await phone.sync.synchronize();
      await phone.sync.resolveConflict(noteId, 'remote');

      expect(phone.note.has(noteId)).toBe(false);
      expect(phone.models.syncStateModel.get(noteId)).toBeNull();
    });
  });

  describe('push', () => {
    it('should raise ConflictError when the remote moved since the last sync', async () => {
      const laptop = await device();
      const note = await laptop.note.create('Plan', 'v1');
      await laptop.sync.push(note);
      remote.put(note.id, remote.get(note.id)?.content ?? '');

      const edited = await laptop.note.update(note.id, { body: 'v2' });

      await expect(laptop.sync.push(edited)).rejects.toThrow(ConflictError);
      expect(laptop.sync.listConflicts().map(conflict => conflict.remoteRevision)).toEqual(['rev-2']);
    });
  });

  describe('pull', () => {
    it('should return changed remote notes without applying them', async () => {
      const laptop = await device();
      const phone = await device();
      const note = await laptop.note.create('Remote only', 'x');
      await laptop.sync.synchronize();

      const pulled = await phone.sync.pull();

      expect(pulled).toEqual([{
        note: {
          id: note.id,
          title: 'Remote only',
          body: 'x',
          tags: [],
          createdAt: note.createdAt,
          updatedAt: note.updatedAt,
        },
        state: { noteId: note.id, remoteRevision: 'rev-1', localDirty: false, deleted: false, lastSyncedAt: '2024-06-01T10:00:00.000Z' },
      }]);
      expect(phone.note.has(note.id)).toBe(false);
      expect(await laptop.sync.pull()).toEqual([]);
    });
  });

  describe('remote failures', () => {
    it('should retry transient failures', async () => {
      const laptop = await device();
      const note = await laptop.note.create('Plan', '');
      remote.failNext(new TimeoutError('list', 15000), 2);

      const report = await laptop.sync.synchronize();

      expect(report.pushed).toEqual([note.id]);
      expect(remote.callsOf('list')).toBe(3);
    });

    it('should give up with SyncUnavailableError and keep local changes', async () => {
      const laptop = await device();
      const note = await laptop.note.create('Plan', '');
      remote.failNext(new TimeoutError('list', 15000), 3);

      await expect(laptop.sync.synchronize()).rejects.toThrow(SyncUnavailableError);
      expect(laptop.note.get(note.id).title).toBe('Plan');
      expect(laptop.models.syncStateModel.get(note.id)).toMatchObject({ localDirty: true });
    });
  });

  describe('with encryption', () => {
    it('should only ever send ciphertext and decrypt on the other device', async () => {
      const laptop = await device(testKey());
      const phone = await device(testKey());
      const note = await laptop.note.create('Diary', 'private thoughts');

      await laptop.sync.synchronize();

      const stored = remote.get(note.id)?.content ?? '';
      expect(JSON.parse(stored)).toMatchObject({ id: note.id, encrypted: true });
      expect(stored).not.toContain('private thoughts');

      await phone.sync.synchronize();
      expect(phone.note.get(note.id)).toMatchObject({ title: 'Diary', body: 'private thoughts', encrypted: true });
    });
  });
});
