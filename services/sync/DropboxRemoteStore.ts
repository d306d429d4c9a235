import { z } from 'zod';
import { BaseService } from '../base/BaseService';
import {
  AuthorizationError,
  ExternalServiceError,
  RemoteRevisionConflictError,
  TimeoutError,
} from '../base/ServiceError';
import type { RemoteEntry, RemoteObject } from '../../shared/types';
import type { RemoteNoteStore } from './RemoteNoteStore';

const API_URL = 'https://api.dropboxapi.com/2/';
const CONTENT_URL = 'https://content.dropboxapi.com/2/';
const NOTE_FILE_PATTERN = /^(.+)\.json$/;

const FileMetadataSchema = z.object({
  name: z.string(),
  rev: z.string(),
});

const ListFolderEntrySchema = z.union([
  FileMetadataSchema.extend({ '.tag': z.literal('file') }),
  z.object({ '.tag': z.enum(['folder', 'deleted']), name: z.string() }),
]);

const ListFolderResultSchema = z.object({
  entries: z.array(ListFolderEntrySchema),
  cursor: z.string(),
  has_more: z.boolean(),
});

const ApiErrorSchema = z.object({
  error_summary: z.string(),
});

interface DropboxRemoteStoreDeps {
  accessToken: string;
  folder: string;
  timeoutMs: number;
}

/**
 * Header values must be plain ASCII; Dropbox expects everything else
 * JSON-escaped as \uXXXX.
 */
export function encodeApiArg(arg: Record<string, unknown>): string {
  return JSON.stringify(arg).replace(/[\u007f-\uffff]/g, ch => `\\u${ch.charCodeAt(0).toString(16).padStart(4, '0')}`);
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

/**
 * RemoteNoteStore over the Dropbox HTTP API v2. Each note is one JSON file
 * `<folder>/<id>.json`; the file `rev` is the revision. Calls are made once:
 * retrying is left to the sync service.
 */
export class DropboxRemoteStore extends BaseService<DropboxRemoteStoreDeps> implements RemoteNoteStore {
  readonly name = 'dropbox';

  constructor(deps: DropboxRemoteStoreDeps) {
    super('DropboxRemoteStore', deps);
  }

  async list(): Promise<RemoteEntry[]> {
    return this.execute('list', async () => {
      const entries: RemoteEntry[] = [];

      const first = await this.rpc('files/list_folder', { path: this.folderPath(), recursive: false });
      if (first.kind === 'error') {
        // A folder that was never written to simply has no notes yet
        if (first.summary.startsWith('path/not_found')) {
          return [];
        }
        throw this.apiError('list_folder', first.summary);
      }

      let page = ListFolderResultSchema.parse(first.body);
      this.collectEntries(page, entries);
      while (page.has_more) {
        const next = await this.rpc('files/list_folder/continue', { cursor: page.cursor });
        if (next.kind === 'error') {
          throw this.apiError('list_folder/continue', next.summary);
        }
        page = ListFolderResultSchema.parse(next.body);
        this.collectEntries(page, entries);
      }

      this.logDebug(`Listed ${entries.length} remote note(s)`);
      return entries;
    });
  }

  async download(noteId: string): Promise<RemoteObject | null> {
    return this.execute('download', async () => {
      const response = await this.send(`${CONTENT_URL}files/download`, {
        'Dropbox-API-Arg': encodeApiArg({ path: this.notePath(noteId) }),
      });

      if (response.status === 409) {
        const summary = await this.errorSummary(response);
        if (summary.startsWith('path/not_found')) {
          return null;
        }
        throw this.apiError('download', summary);
      }

      const metadata = FileMetadataSchema.parse(JSON.parse(response.headers.get('Dropbox-API-Result') ?? 'null'));
      const content = await response.text();
      return { noteId, revision: metadata.rev, content };
    }, { noteId });
  }

  async upload(noteId: string, content: string, expectedRevision: string | null): Promise<string> {
    return this.execute('upload', async () => {
      const mode = expectedRevision === null
        ? { '.tag': 'add' }
        : { '.tag': 'update', update: expectedRevision };

      // strict_conflict: an update of a file deleted since it was listed is a conflict, not a re-create
      const response = await this.send(`${CONTENT_URL}files/upload`, {
        'Content-Type': 'application/octet-stream',
        'Dropbox-API-Arg': encodeApiArg({
          path: this.notePath(noteId),
          mode,
          autorename: false,
          mute: true,
          strict_conflict: true,
        }),
      }, content);

      if (response.status === 409) {
        const summary = await this.errorSummary(response);
        if (summary.startsWith('path/conflict')) {
          throw new RemoteRevisionConflictError(noteId, expectedRevision);
        }
        throw this.apiError('upload', summary);
      }

      const metadata = FileMetadataSchema.parse(await response.json());
      this.logInfo('Uploaded note', { noteId, revision: metadata.rev });
      return metadata.rev;
    }, { noteId, expectedRevision });
  }

  async remove(noteId: string, expectedRevision: string): Promise<void> {
    return this.execute('remove', async () => {
      const result = await this.rpc('files/delete_v2', { path: this.notePath(noteId), parent_rev: expectedRevision });
      if (result.kind === 'ok') {
        this.logInfo('Deleted remote note', { noteId });
        return;
      }
      if (result.summary.startsWith('path_lookup/not_found')) {
        return;
      }
      if (result.summary.includes('conflict')) {
        throw new RemoteRevisionConflictError(noteId, expectedRevision);
      }
      throw this.apiError('delete_v2', result.summary);
    }, { noteId, expectedRevision });
  }

  private collectEntries(page: z.infer<typeof ListFolderResultSchema>, into: RemoteEntry[]): void {
    for (const entry of page.entries) {
      if (entry['.tag'] !== 'file') {
        continue;
      }
      const match = NOTE_FILE_PATTERN.exec(entry.name);
      if (match) {
        into.push({ noteId: match[1], revision: entry.rev });
      }
    }
  }

  /**
   * JSON-bodied RPC endpoint. A 409 is an endpoint-specific error that the
   * caller interprets; other failures throw.
   */
  private async rpc(endpoint: string, body: Record<string, unknown>): Promise<{ kind: 'ok'; body: unknown } | { kind: 'error'; summary: string }> {
    const response = await this.send(`${API_URL}${endpoint}`, { 'Content-Type': 'application/json' }, JSON.stringify(body));
    if (response.status === 409) {
      return { kind: 'error', summary: await this.errorSummary(response) };
    }
    return { kind: 'ok', body: await response.json() };
  }

  /**
   * Issues one POST. Resolves for 2xx and 409 responses only.
   */
  private async send(url: string, headers: Record<string, string>, body?: string): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: { Authorization: `Bearer ${this.deps.accessToken}`, ...headers },
        body,
        signal: AbortSignal.timeout(this.deps.timeoutMs),
      });
    } catch (error) {
      if (isAbortError(error)) {
        throw new TimeoutError(`Dropbox ${url}`, this.deps.timeoutMs);
      }
      throw error;
    }

    if (response.ok || response.status === 409) {
      return response;
    }

    const detail = await response.text();
    if (response.status === 401) {
      throw new AuthorizationError('access', 'Dropbox', { detail });
    }
    const retryable = response.status === 429 || response.status >= 500;
    this.logWarn(`Dropbox responded ${response.status}`, detail);
    throw new ExternalServiceError('Dropbox', `${response.status} ${response.statusText}`.trim(), { status: response.status, retryable });
  }

  private async errorSummary(response: Response): Promise<string> {
    const text = await response.text();
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch {
      return text;
    }
    const result = ApiErrorSchema.safeParse(parsed);
    return result.success ? result.data.error_summary : text;
  }

  private apiError(endpoint: string, summary: string): ExternalServiceError {
    return new ExternalServiceError('Dropbox', `${endpoint}: ${summary}`, { status: 409, retryable: false });
  }

  private folderPath(): string {
    const trimmed = this.deps.folder.replace(/\/+$/, '');
    return trimmed === '' ? '' : trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
  }

  private notePath(noteId: string): string {
    return `${this.folderPath()}/${noteId}.json`;
  }
}
