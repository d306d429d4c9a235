import { v4 as uuidv4 } from 'uuid';
import type Database from 'better-sqlite3';
import { BaseService } from './base/BaseService';
import { AuthenticationError, DecryptionError, NotFoundError, ValidationError } from './base/ServiceError';
import { decrypt, encrypt, type CipherKey } from './crypto/cipher';
import { NoteModel, type StoredNote, type StoredNoteBody } from '../models/NoteModel';
import { ReminderModel } from '../models/ReminderModel';
import { SyncStateModel } from '../models/SyncStateModel';
import {
  ALL_SEARCH_FIELDS,
  type Note,
  type NoteContent,
  type NoteSearchField,
  type NoteSnapshot,
  type Reminder,
  type UpdateNotePayload,
} from '../shared/types';
import {
  EncryptedBlobSchema,
  NoteContentSchema,
  type RemoteNoteDocument,
} from '../shared/schemas/noteSchemas';
import { normalizeTags } from '../utils/tags';

export const MIN_ID_PREFIX_LENGTH = 4;

interface NoteServiceDeps {
  db: Database.Database;
  noteModel: NoteModel;
  reminderModel: ReminderModel;
  syncStateModel: SyncStateModel;
  cipherKey?: CipherKey | null;
  now?: () => Date;
}

/** What the in-memory cache holds; reminders are joined on read. */
type CachedNote = Omit<Note, 'reminder'>;

/** JSON.parse that yields undefined for malformed input, left to schema validation to reject. */
function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function copyNote(note: CachedNote, reminder: Reminder | null): Note {
  return { ...note, tags: [...note.tags], reminder };
}

/**
 * The note store. Rows are decrypted once on open into an in-memory cache;
 * every mutation is written through inside an IMMEDIATE transaction and, when
 * a key is present, sealed before it reaches the database.
 */
export class NoteService extends BaseService<NoteServiceDeps> {
  private notes = new Map<string, CachedNote>();
  private loaded = false;

  constructor(deps: NoteServiceDeps) {
    super('NoteService', deps);
  }

  async initialize(): Promise<void> {
    await this.open();
  }

  /**
   * Drops the decrypted cache.
   */
  async cleanup(): Promise<void> {
    this.notes.clear();
    this.loaded = false;
  }

  get isEncryptionEnabled(): boolean {
    return Boolean(this.deps.cipherKey);
  }

  /**
   * Loads and decrypts every stored note. Fails as a whole with
   * DecryptionError if any encrypted row cannot be opened.
   */
  async open(): Promise<void> {
    return this.execute('open', async () => {
      const loaded = new Map<string, CachedNote>();
      for (const row of this.deps.noteModel.getAll()) {
        loaded.set(row.id, this.decodeRow(row));
      }
      this.notes = loaded;
      this.loaded = true;
      this.logDebug(`Loaded ${loaded.size} note(s)`);
    });
  }

  /**
   * Creates a new note.
   */
  async create(title: string, body: string, tags: string[] = []): Promise<Note> {
    return this.execute('create', async () => {
      this.ensureLoaded();
      const content: NoteContent = { title: this.requireTitle(title), body, tags: normalizeTags(tags) };
      const timestamp = this.now().toISOString();
      const note: CachedNote = {
        id: uuidv4(),
        ...content,
        createdAt: timestamp,
        updatedAt: timestamp,
        encrypted: this.isEncryptionEnabled,
      };

      this.withTransaction(this.deps.db, () => {
        this.deps.noteModel.insert({ id: note.id, createdAt: timestamp, updatedAt: timestamp, ...this.seal(content) });
        this.deps.syncStateModel.markDirty(note.id);
      });

      this.notes.set(note.id, note);
      this.logInfo('Created note', { id: note.id });
      return copyNote(note, null);
    });
  }

  /**
   * Updates title, body and/or tags. Omitted fields keep their value.
   */
  async update(id: string, fields: UpdateNotePayload): Promise<Note> {
    return this.execute('update', async () => {
      const existing = this.requireCached(id);
      if (fields.title === undefined && fields.body === undefined && fields.tags === undefined) {
        throw new ValidationError('Nothing to update: give a title, body or tags');
      }

      const content: NoteContent = {
        title: fields.title === undefined ? existing.title : this.requireTitle(fields.title),
        body: fields.body ?? existing.body,
        tags: fields.tags === undefined ? existing.tags : normalizeTags(fields.tags),
      };
      const updated: CachedNote = {
        ...existing,
        ...content,
        updatedAt: this.nextTimestamp(existing.updatedAt),
        encrypted: this.isEncryptionEnabled,
      };

      this.withTransaction(this.deps.db, () => {
        if (!this.deps.noteModel.update(id, this.seal(content), updated.updatedAt)) {
          throw new NotFoundError('Note', id);
        }
        this.deps.syncStateModel.markDirty(id);
      });

      this.notes.set(id, updated);
      this.logInfo('Updated note', { id });
      return copyNote(updated, this.deps.reminderModel.getByNoteId(id));
    }, { id });
  }

  /**
   * Deletes a note together with its reminder. If the note was ever synced a
   * tombstone is kept so the deletion reaches the remote.
   */
  async delete(id: string): Promise<void> {
    return this.execute('delete', async () => {
      this.requireCached(id);

      this.withTransaction(this.deps.db, () => {
        this.deps.reminderModel.delete(id);
        this.deps.noteModel.delete(id);
        this.deps.syncStateModel.markDeleted(id);
      });

      this.notes.delete(id);
      this.logInfo('Deleted note', { id });
    }, { id });
  }

  get(id: string): Note {
    const note = this.requireCached(id);
    return copyNote(note, this.deps.reminderModel.getByNoteId(id));
  }

  has(id: string): boolean {
    this.ensureLoaded();
    return this.notes.has(id);
  }

  /**
   * All notes in insertion order.
   */
  list(): Note[] {
    this.ensureLoaded();
    const reminders = new Map(this.deps.reminderModel.getAll().map(reminder => [reminder.noteId, reminder]));
    return Array.from(this.notes.values(), note => copyNote(note, reminders.get(note.id) ?? null));
  }

  /**
   * Case-insensitive substring search over the chosen fields. An empty
   * query returns every note in insertion order.
   */
  search(query: string, by: readonly NoteSearchField[] = ALL_SEARCH_FIELDS): Note[] {
    if (by.length === 0) {
      throw new ValidationError('Search needs at least one field to match on');
    }
    const needle = query.trim().toLowerCase();
    const notes = this.list();
    if (!needle) {
      return notes;
    }

    return notes.filter(note =>
      (by.includes('title') && note.title.toLowerCase().includes(needle)) ||
      (by.includes('content') && note.body.toLowerCase().includes(needle)) ||
      (by.includes('tag') && note.tags.some(tag => tag.toLowerCase().includes(needle)))
    );
  }

  /**
   * Accepts a full id or a unique prefix of at least four characters.
   */
  resolveId(idOrPrefix: string): string {
    this.ensureLoaded();
    const candidate = idOrPrefix.trim().toLowerCase();
    if (this.notes.has(candidate)) {
      return candidate;
    }
    if (candidate.length < MIN_ID_PREFIX_LENGTH) {
      throw new NotFoundError('Note', idOrPrefix);
    }

    const matches = Array.from(this.notes.keys()).filter(id => id.startsWith(candidate));
    if (matches.length === 0) {
      throw new NotFoundError('Note', idOrPrefix);
    }
    if (matches.length > 1) {
      throw new ValidationError(`Id prefix '${idOrPrefix}' is ambiguous (${matches.length} notes match)`, { matches });
    }
    return matches[0];
  }

  /**
   * Rewrites every plaintext row sealed under the current key. Content and
   * modified timestamps are unchanged; the notes are marked dirty so the
   * remote copies get replaced by sealed ones too.
   * @returns the number of notes rewritten
   */
  async encryptAll(): Promise<number> {
    return this.execute('encryptAll', async () => {
      this.ensureLoaded();
      if (!this.isEncryptionEnabled) {
        throw new ValidationError('Encryption is not enabled: no key available');
      }

      const plaintextNotes = Array.from(this.notes.values()).filter(note => !note.encrypted);
      this.withTransaction(this.deps.db, () => {
        for (const note of plaintextNotes) {
          this.deps.noteModel.update(note.id, this.seal(note), note.updatedAt);
          this.deps.syncStateModel.markDirty(note.id);
        }
      });

      for (const note of plaintextNotes) {
        this.notes.set(note.id, { ...note, encrypted: true });
      }
      if (plaintextNotes.length > 0) {
        this.logInfo(`Encrypted ${plaintextNotes.length} note(s) at rest`);
      }
      return plaintextNotes.length;
    });
  }

  /**
   * Adopts a note downloaded from the remote, keeping its id and timestamps.
   * Sync markers are left to the caller.
   */
  async applyRemote(snapshot: NoteSnapshot): Promise<Note> {
    return this.execute('applyRemote', async () => {
      this.ensureLoaded();
      const content: NoteContent = { title: snapshot.title, body: snapshot.body, tags: normalizeTags(snapshot.tags) };
      const existing = this.notes.get(snapshot.id);
      const note: CachedNote = {
        id: snapshot.id,
        ...content,
        createdAt: existing?.createdAt ?? snapshot.createdAt,
        updatedAt: snapshot.updatedAt,
        encrypted: this.isEncryptionEnabled,
      };

      this.withTransaction(this.deps.db, () => {
        if (existing) {
          this.deps.noteModel.update(note.id, this.seal(content), note.updatedAt);
        } else {
          this.deps.noteModel.insert({ id: note.id, createdAt: note.createdAt, updatedAt: note.updatedAt, ...this.seal(content) });
        }
      });

      this.notes.set(note.id, note);
      return copyNote(note, this.deps.reminderModel.getByNoteId(note.id));
    }, { id: snapshot.id });
  }

  /**
   * Removes a note the remote deleted. No tombstone is recorded.
   */
  async applyRemoteDeletion(id: string): Promise<void> {
    return this.execute('applyRemoteDeletion', async () => {
      this.ensureLoaded();
      this.withTransaction(this.deps.db, () => {
        this.deps.reminderModel.delete(id);
        this.deps.noteModel.delete(id);
      });
      this.notes.delete(id);
    }, { id });
  }

  /**
   * Wire form of a note for the remote store. With a key present the
   * document carries a sealed blob instead of the plaintext fields.
   */
  toDocument(note: NoteSnapshot): RemoteNoteDocument {
    const base = { version: 1 as const, id: note.id, createdAt: note.createdAt, updatedAt: note.updatedAt };
    if (this.deps.cipherKey) {
      const content: NoteContent = { title: note.title, body: note.body, tags: note.tags };
      return { ...base, encrypted: true, payload: encrypt(JSON.stringify(content), this.deps.cipherKey) };
    }
    return { ...base, encrypted: false, title: note.title, body: note.body, tags: [...note.tags] };
  }

  fromDocument(document: RemoteNoteDocument): NoteSnapshot {
    const base = { id: document.id, createdAt: document.createdAt, updatedAt: document.updatedAt };
    if (!document.encrypted) {
      return { ...base, title: document.title, body: document.body, tags: normalizeTags(document.tags) };
    }
    const content = this.openSealed(JSON.stringify(document.payload), document.id);
    return { ...base, ...content };
  }

  private decodeRow(row: StoredNote): CachedNote {
    const base = { id: row.id, createdAt: row.createdAt, updatedAt: row.updatedAt };
    if (!row.encrypted) {
      return { ...base, ...row.content, encrypted: false };
    }
    return { ...base, ...this.openSealed(row.payload, row.id), encrypted: true };
  }

  private openSealed(payload: string, noteId: string): NoteContent {
    const cipherKey = this.deps.cipherKey;
    if (!cipherKey) {
      throw new DecryptionError('Notes are encrypted: a passphrase is required', { noteId });
    }

    const blob = EncryptedBlobSchema.safeParse(parseJson(payload));
    if (!blob.success) {
      throw new DecryptionError(`Encrypted note '${noteId}' is corrupted`, { noteId });
    }

    let plaintext: string;
    try {
      plaintext = decrypt(blob.data, cipherKey);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw new DecryptionError(`Cannot decrypt note '${noteId}': wrong key or tampered data`, { noteId });
      }
      throw error;
    }

    const content = NoteContentSchema.safeParse(parseJson(plaintext));
    if (!content.success) {
      throw new DecryptionError(`Encrypted note '${noteId}' has an unexpected shape`, { noteId });
    }
    return content.data;
  }

  private seal(content: NoteContent): StoredNoteBody {
    const plain: NoteContent = { title: content.title, body: content.body, tags: [...content.tags] };
    if (!this.deps.cipherKey) {
      return { encrypted: false, content: plain };
    }
    return { encrypted: true, payload: JSON.stringify(encrypt(JSON.stringify(plain), this.deps.cipherKey)) };
  }

  private requireTitle(title: string): string {
    const trimmed = title.trim();
    if (!trimmed) {
      throw new ValidationError('Note title must not be empty');
    }
    return trimmed;
  }

  private requireCached(id: string): CachedNote {
    this.ensureLoaded();
    const note = this.notes.get(id);
    if (!note) {
      throw new NotFoundError('Note', id);
    }
    return note;
  }

  private ensureLoaded(): void {
    if (!this.loaded) {
      throw new Error('NoteService used before open()');
    }
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  /**
   * Modified timestamps strictly increase even if the clock has not moved
   * (or moved backwards) since the previous write.
   */
  private nextTimestamp(previousIso: string): string {
    const now = this.now().getTime();
    const previous = Date.parse(previousIso);
    return new Date(now > previous ? now : previous + 1).toISOString();
  }
}
