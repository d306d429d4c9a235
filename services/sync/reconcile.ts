import type { LocalRevision, RemoteRevision, Resolution } from '../../shared/types';

/**
 * Whether the local side moved since the last common revision: an unsynced or
 * dirty note, or a pending tombstone.
 */
export function hasLocalChange(local: LocalRevision): boolean {
  if (local.note === null) {
    return local.state?.deleted === true;
  }
  return local.state === null || local.state.localDirty || local.state.remoteRevision === null;
}

/**
 * Whether the remote side moved since the last common revision, including
 * appearing or disappearing.
 */
export function hasRemoteChange(local: LocalRevision, remote: RemoteRevision): boolean {
  const base = local.state?.remoteRevision ?? null;
  return remote.revision !== base;
}

/**
 * Three-way decision for one note. When exactly one side changed that side
 * wins; when both did the result is a conflict for the user to settle.
 */
export function reconcile(local: LocalRevision, remote: RemoteRevision): Resolution {
  if (local.noteId !== remote.noteId) {
    throw new Error(`Cannot reconcile different notes: ${local.noteId} vs ${remote.noteId}`);
  }

  // Gone on both sides, whatever happened in between
  if (local.note === null && remote.revision === null) {
    return { kind: 'in_sync' };
  }

  const localChanged = hasLocalChange(local);
  const remoteChanged = hasRemoteChange(local, remote);

  if (localChanged && remoteChanged) {
    return { kind: 'conflict', local, remote };
  }
  if (localChanged) {
    return { kind: 'local_wins' };
  }
  if (remoteChanged) {
    return { kind: 'remote_wins' };
  }
  return { kind: 'in_sync' };
}
