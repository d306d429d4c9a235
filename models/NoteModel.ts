import type Database from 'better-sqlite3';
import { BaseModel } from './BaseModel';
import { logger } from '../utils/logger';
import type { NoteContent } from '../shared/types';

// Define the structure returned by the database (snake_case)
interface NoteRecord {
  id: string;
  position: number;
  title: string | null;
  body: string | null;
  tags_json: string | null;
  encrypted: number;
  payload: string | null;
  created_at: string;
  updated_at: string;
}

/** Either the plaintext fields or the serialized EncryptedBlob sealing them. */
export type StoredNoteBody =
  | { encrypted: false; content: NoteContent }
  | { encrypted: true; payload: string };

/** A note row as persisted, before any decryption. */
export type StoredNote = StoredNoteBody & {
  id: string;
  position: number;
  createdAt: string;
  updatedAt: string;
};

interface BodyColumns {
  title: string | null;
  body: string | null;
  tagsJson: string | null;
  encrypted: 0 | 1;
  payload: string | null;
}

function parseTags(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return Array.isArray(parsed) ? parsed.filter((tag): tag is string => typeof tag === 'string') : [];
}

// Helper to convert DB record (snake_case) to application object (camelCase)
function mapRecordToStoredNote(record: NoteRecord): StoredNote {
  const common = {
    id: record.id,
    position: record.position,
    createdAt: record.created_at,
    updatedAt: record.updated_at,
  };

  if (record.encrypted === 1) {
    return { ...common, encrypted: true, payload: record.payload ?? '' };
  }

  return {
    ...common,
    encrypted: false,
    content: {
      title: record.title ?? '',
      body: record.body ?? '',
      tags: record.tags_json ? parseTags(record.tags_json) : [],
    },
  };
}

function toBodyColumns(body: StoredNoteBody): BodyColumns {
  if (body.encrypted) {
    return { title: null, body: null, tagsJson: null, encrypted: 1, payload: body.payload };
  }
  return {
    title: body.content.title,
    body: body.content.body,
    tagsJson: JSON.stringify(body.content.tags),
    encrypted: 0,
    payload: null,
  };
}

export class NoteModel extends BaseModel {
  protected readonly modelName = 'NoteModel';

  constructor(db: Database.Database) {
    super(db);
  }

  /**
   * Inserts a note row. The position defaults to the end of the list, which
   * is what keeps listing in insertion order.
   */
  insert(params: StoredNoteBody & { id: string; createdAt: string; updatedAt: string; position?: number }): StoredNote {
    const position = params.position ?? this.getNextPosition();
    const columns = toBodyColumns(params);

    try {
      this.db.prepare(`
        INSERT INTO notes (id, position, title, body, tags_json, encrypted, payload, created_at, updated_at)
        VALUES ($id, $position, $title, $body, $tagsJson, $encrypted, $payload, $createdAt, $updatedAt)
      `).run({
        id: params.id,
        position,
        ...columns,
        createdAt: params.createdAt,
        updatedAt: params.updatedAt,
      });
    } catch (error) {
      this.handleDbError(error, 'insert');
    }

    logger.debug('[NoteModel] Inserted note', { id: params.id, encrypted: params.encrypted });

    const created = this.getById(params.id);
    if (!created) {
      throw new Error(`Failed to retrieve inserted note: ${params.id}`);
    }
    return created;
  }

  /**
   * Gets a note row by ID.
   */
  getById(id: string): StoredNote | null {
    const record = this.db.prepare('SELECT * FROM notes WHERE id = ?').get(id) as NoteRecord | undefined;
    return record ? mapRecordToStoredNote(record) : null;
  }

  /**
   * Gets all note rows in insertion order.
   */
  getAll(): StoredNote[] {
    const records = this.db.prepare('SELECT * FROM notes ORDER BY position ASC').all() as NoteRecord[];
    return records.map(mapRecordToStoredNote);
  }

  /**
   * Replaces a note's fields (plaintext or sealed) and its modified timestamp.
   * Returns false when no row matched.
   */
  update(id: string, body: StoredNoteBody, updatedAt: string): boolean {
    try {
      const result = this.db.prepare(`
        UPDATE notes
        SET title = $title, body = $body, tags_json = $tagsJson, encrypted = $encrypted,
            payload = $payload, updated_at = $updatedAt
        WHERE id = $id
      `).run({ id, ...toBodyColumns(body), updatedAt });

      if (result.changes === 0) {
        logger.warn('[NoteModel] No note found to update', { id });
        return false;
      }
      return true;
    } catch (error) {
      this.handleDbError(error, 'update');
    }
  }

  /**
   * Deletes a note row by ID. Its reminder goes with it (ON DELETE CASCADE).
   */
  delete(id: string): boolean {
    try {
      const result = this.db.prepare('DELETE FROM notes WHERE id = ?').run(id);
      const deleted = result.changes > 0;
      if (!deleted) {
        logger.warn('[NoteModel] No note found to delete', { id });
      }
      return deleted;
    } catch (error) {
      this.handleDbError(error, 'delete');
    }
  }

  /**
   * Gets the next available position.
   */
  private getNextPosition(): number {
    const result = this.db.prepare('SELECT MAX(position) AS maxPosition FROM notes').get() as { maxPosition: number | null };
    return (result.maxPosition ?? -1) + 1;
  }
}
