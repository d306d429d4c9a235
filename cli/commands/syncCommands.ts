import { EXIT_CODES, ValidationError } from '../../services/base/ServiceError';
import { MIN_ID_PREFIX_LENGTH } from '../../services/NoteService';
import type { SyncService } from '../../services/sync/SyncService';
import type { ConflictChoice } from '../../shared/types';
import { requirePositional, stringOption, type CommandContext, type CommandRegistry } from '../CommandRegistry';
import { formatConflict, formatSyncReport, shortId } from '../output';

export async function requireSync(context: CommandContext): Promise<SyncService> {
  const { sync } = await context.services();
  if (!sync) {
    throw new ValidationError("Cloud sync is not configured: set DROPBOX_TOKEN or run 'notetaker config dropboxToken <token>'");
  }
  return sync;
}

function parseChoice(input: string | undefined, usage: string): ConflictChoice {
  if (input === 'local' || input === 'remote') {
    return input;
  }
  throw new ValidationError(`--keep must be 'local' or 'remote'\nUsage: ${usage}`);
}

export function registerSyncCommands(registry: CommandRegistry): void {
  registry.register({
    name: 'sync',
    usage: 'notetaker sync',
    summary: 'Synchronise with Dropbox now',
    async run(_args, context) {
      const sync = await requireSync(context);
      const report = await sync.synchronize();
      formatSyncReport(report).forEach(line => context.io.out(line));
      return report.conflicts.length > 0 ? EXIT_CODES.syncConflict : EXIT_CODES.ok;
    },
  });

  registry.register({
    name: 'conflicts',
    usage: 'notetaker conflicts',
    summary: 'List notes changed both locally and remotely',
    async run(_args, context) {
      const sync = await requireSync(context);
      const { note: noteService } = await context.services();
      const conflicts = sync.listConflicts();
      if (conflicts.length === 0) {
        context.io.out('No conflicts.');
        return;
      }
      for (const conflict of conflicts) {
        const local = noteService.has(conflict.noteId) ? noteService.get(conflict.noteId) : null;
        formatConflict(conflict, local, context.settings.config.timezone).forEach(line => context.io.out(line));
      }
      context.io.out("Resolve with 'notetaker resolve <id> --keep local|remote'");
      return EXIT_CODES.syncConflict;
    },
  });

  registry.register({
    name: 'resolve',
    usage: 'notetaker resolve <id> --keep local|remote',
    summary: 'Settle a conflict by keeping one side',
    options: { keep: { type: 'string', short: 'k' } },
    async run(args, context) {
      const idOrPrefix = requirePositional(args, 0, 'note id', this.usage);
      const keep = parseChoice(stringOption(args, 'keep'), this.usage);
      const sync = await requireSync(context);

      // The note may exist only on the remote side of the conflict
      const candidate = idOrPrefix.trim().toLowerCase();
      const conflictIds = sync.listConflictIds();
      const matches = conflictIds.includes(candidate)
        ? [candidate]
        : candidate.length < MIN_ID_PREFIX_LENGTH ? [] : conflictIds.filter(id => id.startsWith(candidate));
      if (matches.length !== 1) {
        throw new ValidationError(matches.length === 0
          ? `No conflict for note '${idOrPrefix}'`
          : `Id prefix '${idOrPrefix}' matches ${matches.length} conflicts`);
      }

      await sync.resolveConflict(matches[0], keep);
      context.io.out(`Resolved ${shortId(matches[0])}: kept ${keep} copy`);
    },
  });
}
