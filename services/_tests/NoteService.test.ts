import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import Database from 'better-sqlite3';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { initDb } from '../../models/db';
import { DecryptionError, NotFoundError, ValidationError } from '../base/ServiceError';
import { createClock, createTestServices, testKey, type TestServices } from '../../test-utils/services';

vi.mock('../../utils/logger', async () => (await import('../../test-utils/mocks/logger')).mockLoggerModule);

const UUID_V4 = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('NoteService', () => {
  let clock: ReturnType<typeof createClock>;
  let services: TestServices;

  beforeEach(async () => {
    clock = createClock('2024-05-01T12:00:00.000Z');
    services = await createTestServices({ now: clock.now });
  });

  describe('create', () => {
    it('should create a note with a v4 id and equal timestamps', async () => {
      const note = await services.note.create('  Groceries ', 'Milk and eggs', ['home', ' Home', 'errands']);

      expect(note.id).toMatch(UUID_V4);
      expect(note).toMatchObject({
        title: 'Groceries',
        body: 'Milk and eggs',
        tags: ['home', 'errands'],
        createdAt: '2024-05-01T12:00:00.000Z',
        updatedAt: '2024-05-01T12:00:00.000Z',
        reminder: null,
        encrypted: false,
      });
    });

    it('should reject a blank title', async () => {
      await expect(services.note.create('   ', 'body')).rejects.toThrow(ValidationError);
      expect(services.note.list()).toEqual([]);
    });

    it('should mark new notes dirty for sync', async () => {
      const note = await services.note.create('Draft', '');

      expect(services.models.syncStateModel.get(note.id)).toMatchObject({ localDirty: true, remoteRevision: null });
    });
  });

  it('should list notes in insertion order', async () => {
    await services.note.create('Zebra', '');
    await services.note.create('Apple', '');
    await services.note.create('Mango', '');

    expect(services.note.list().map(note => note.title)).toEqual(['Zebra', 'Apple', 'Mango']);
  });

  describe('update', () => {
    it('should keep omitted fields and the creation time', async () => {
      const note = await services.note.create('Plan', 'step one', ['work']);
      clock.advance(60_000);

      const updated = await services.note.update(note.id, { body: 'step two' });

      expect(updated).toMatchObject({
        title: 'Plan',
        body: 'step two',
        tags: ['work'],
        createdAt: '2024-05-01T12:00:00.000Z',
        updatedAt: '2024-05-01T12:01:00.000Z',
      });
    });

    it('should strictly increase the modified time when the clock stands still', async () => {
      const note = await services.note.create('Plan', '');

      const first = await services.note.update(note.id, { title: 'Plan A' });
      const second = await services.note.update(note.id, { title: 'Plan B' });

      expect(first.updatedAt).toBe('2024-05-01T12:00:00.001Z');
      expect(second.updatedAt).toBe('2024-05-01T12:00:00.002Z');
    });

    it('should strictly increase the modified time when the clock goes backwards', async () => {
      const note = await services.note.create('Plan', '');
      clock.set('2024-04-30T00:00:00.000Z');

      const updated = await services.note.update(note.id, { body: 'later' });

      expect(updated.updatedAt).toBe('2024-05-01T12:00:00.001Z');
    });

    it('should reject an update with no fields', async () => {
      const note = await services.note.create('Plan', '');
      await expect(services.note.update(note.id, {})).rejects.toThrow(ValidationError);
    });

    it('should reject unknown ids', async () => {
      await expect(services.note.update('missing', { title: 'x' })).rejects.toThrow(NotFoundError);
    });
  });

  describe('delete', () => {
    it('should remove the note and its reminder', async () => {
      const note = await services.note.create('Call Sam', '');
      await services.reminder.schedule(note.id, '2024-05-01T08:00', 'UTC');

      await services.note.delete(note.id);

      expect(() => services.note.get(note.id)).toThrow(NotFoundError);
      expect(services.reminder.dueNow(clock.now())).toEqual([]);
    });

    it('should not leave a sync marker for a note never synced', async () => {
      const note = await services.note.create('Scratch', '');
      await services.note.delete(note.id);

      expect(services.models.syncStateModel.get(note.id)).toBeNull();
    });
  });

  describe('search', () => {
    beforeEach(async () => {
      await services.note.create('weekly meeting notes', 'agenda', ['work']);
      await services.note.create('Groceries', 'buy coffee for the meeting room', ['home']);
      await services.note.create('Holiday', 'book flights', ['Travel']);
    });

    it('should match case-insensitively across all fields by default', () => {
      expect(services.note.search('Meeting').map(note => note.title)).toEqual(['weekly meeting notes', 'Groceries']);
    });

    it('should restrict matching to the chosen fields', () => {
      expect(services.note.search('meeting', ['title']).map(note => note.title)).toEqual(['weekly meeting notes']);
      expect(services.note.search('travel', ['tag']).map(note => note.title)).toEqual(['Holiday']);
      expect(services.note.search('travel', ['title', 'content'])).toEqual([]);
    });

    it('should return every note for an empty query', () => {
      expect(services.note.search('  ')).toHaveLength(3);
    });

    it('should require at least one field', () => {
      expect(() => services.note.search('x', [])).toThrow(ValidationError);
    });
  });

  describe('resolveId', () => {
    const snapshot = (id: string, title: string) => ({
      id,
      title,
      body: '',
      tags: [],
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-01T00:00:00.000Z',
    });

    beforeEach(async () => {
      await services.note.applyRemote(snapshot('abcd1111-0000-4000-8000-000000000000', 'One'));
      await services.note.applyRemote(snapshot('abcd2222-0000-4000-8000-000000000000', 'Two'));
    });

    it('should accept a full id or a unique prefix', () => {
      expect(services.note.resolveId('ABCD2222-0000-4000-8000-000000000000')).toBe('abcd2222-0000-4000-8000-000000000000');
      expect(services.note.resolveId('abcd1')).toBe('abcd1111-0000-4000-8000-000000000000');
    });

    it('should reject ambiguous and too-short prefixes', () => {
      expect(() => services.note.resolveId('abcd')).toThrow(ValidationError);
      expect(() => services.note.resolveId('abc')).toThrow(NotFoundError);
      expect(() => services.note.resolveId('ffff')).toThrow(NotFoundError);
    });
  });

  it('should read back what an earlier session stored', async () => {
    const db = new Database(':memory:');
    const first = await createTestServices({ db, now: clock.now });
    const note = await first.note.create('Persistent', 'still here', ['keep']);

    const second = await createTestServices({ db, now: clock.now });

    expect(second.note.get(note.id)).toEqual(note);
  });

  describe('two processes on one database file', () => {
    let dir: string;
    let first: TestServices;
    let second: TestServices;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'notetaker-db-'));
      const file = path.join(dir, 'notes.db');
      first = await createTestServices({ db: initDb(file), now: clock.now });
      second = await createTestServices({ db: initDb(file), now: clock.now });
    });

    afterEach(async () => {
      first.db.close();
      second.db.close();
      await fs.remove(dir);
    });

    it('should make a second writer wait for the write lock', async () => {
      second.db.pragma('busy_timeout = 100');
      first.db.exec('BEGIN IMMEDIATE');

      const started = Date.now();
      await expect(second.note.create('Blocked', '')).rejects.toThrow(/database is locked/);
      expect(Date.now() - started).toBeGreaterThanOrEqual(50);
      expect(second.note.list()).toEqual([]);

      first.db.exec('COMMIT');
      const note = await second.note.create('After unlock', '');

      expect(first.models.noteModel.getAll().map(row => row.id)).toEqual([note.id]);
    });

    it('should not let a stale copy overwrite a note the other process deleted', async () => {
      const note = await first.note.create('Shared', 'v1');
      await second.note.open();
      await first.note.delete(note.id);

      await expect(second.note.update(note.id, { body: 'v2' })).rejects.toThrow(NotFoundError);

      expect(first.models.noteModel.getAll()).toEqual([]);
      expect(first.models.syncStateModel.get(note.id)).toBeNull();
    });
  });

  describe('encryption at rest', () => {
    it('should store only ciphertext when a key is present', async () => {
      const db = new Database(':memory:');
      const encrypted = await createTestServices({ db, cipherKey: testKey(), now: clock.now });

      const note = await encrypted.note.create('Bank PIN', 'top secret body', ['private']);

      expect(note.encrypted).toBe(true);
      const row = db.prepare('SELECT title, body, tags_json, encrypted, payload FROM notes WHERE id = ?').get(note.id);
      expect(row).toMatchObject({ title: null, body: null, tags_json: null, encrypted: 1 });
      expect(JSON.stringify(row)).not.toContain('top secret body');
    });

    it('should reopen with the same key', async () => {
      const db = new Database(':memory:');
      const first = await createTestServices({ db, cipherKey: testKey(), now: clock.now });
      const note = await first.note.create('Bank PIN', '1234');

      const second = await createTestServices({ db, cipherKey: testKey(), now: clock.now });

      expect(second.note.get(note.id)).toMatchObject({ title: 'Bank PIN', body: '1234', encrypted: true });
    });

    it('should fail to open without a key or with the wrong key', async () => {
      const db = new Database(':memory:');
      const first = await createTestServices({ db, cipherKey: testKey(), now: clock.now });
      await first.note.create('Bank PIN', '1234');

      await expect(createTestServices({ db, now: clock.now })).rejects.toThrow(DecryptionError);
      await expect(createTestServices({ db, cipherKey: testKey('wrong-secret'), now: clock.now })).rejects.toThrow(DecryptionError);
    });

    it('should encrypt existing plaintext notes without touching their timestamps', async () => {
      const db = new Database(':memory:');
      const plain = await createTestServices({ db, now: clock.now });
      const note = await plain.note.create('Old note', 'written before encryption');
      clock.advance(5000);

      const encrypted = await createTestServices({ db, cipherKey: testKey(), now: clock.now });

      expect(await encrypted.note.encryptAll()).toBe(1);
      expect(await encrypted.note.encryptAll()).toBe(0);
      expect(encrypted.note.get(note.id)).toMatchObject({ encrypted: true, updatedAt: '2024-05-01T12:00:00.000Z' });
      expect(db.prepare('SELECT encrypted FROM notes WHERE id = ?').get(note.id)).toEqual({ encrypted: 1 });
    });

    it('should refuse encryptAll without a key', async () => {
      await expect(services.note.encryptAll()).rejects.toThrow(ValidationError);
    });
  });

  describe('remote documents', () => {
    const snapshot = {
      id: '0f0e0d0c-0000-4000-8000-000000000000',
      title: 'Shared',
      body: 'body',
      tags: ['a'],
      createdAt: '2024-01-01T00:00:00.000Z',
      updatedAt: '2024-01-02T00:00:00.000Z',
    };

    it('should carry plaintext fields when no key is set', () => {
      expect(services.note.toDocument(snapshot)).toEqual({ version: 1, encrypted: false, ...snapshot });
    });

    it('should seal the fields when a key is set and open them again', async () => {
      const encrypted = await createTestServices({ cipherKey: testKey(), now: clock.now });

      const document = encrypted.note.toDocument(snapshot);

      expect(document.encrypted).toBe(true);
      expect(JSON.stringify(document)).not.toContain('Shared');
      expect(encrypted.note.fromDocument(document)).toEqual(snapshot);
      expect(() => services.note.fromDocument(document)).toThrow(DecryptionError);
    });
  });
});
