import { ValidationError } from '../../services/base/ServiceError';
import { ALL_SEARCH_FIELDS, type NoteSearchField, type UpdateNotePayload } from '../../shared/types';
import { parseTagList } from '../../utils/tags';
import {
  booleanOption,
  requirePositional,
  stringOption,
  type CommandContext,
  type CommandRegistry,
  type ParsedCommandArgs,
} from '../CommandRegistry';
import { formatNoteDetail, formatNoteList, shortId } from '../output';

const SEARCH_FIELDS = new Set<string>(ALL_SEARCH_FIELDS);

function isSearchField(value: string): value is NoteSearchField {
  return SEARCH_FIELDS.has(value);
}

export function parseSearchFields(input: string | undefined): NoteSearchField[] {
  if (input === undefined) {
    return [...ALL_SEARCH_FIELDS];
  }
  const fields = input.split(',').map(field => field.trim().toLowerCase()).filter(Boolean);
  const unknown = fields.filter(field => !isSearchField(field));
  if (unknown.length > 0 || fields.length === 0) {
    throw new ValidationError(`--by takes a comma-separated list of: ${ALL_SEARCH_FIELDS.join(', ')}`);
  }
  return fields.filter(isSearchField);
}

/**
 * `--body -` reads the body from stdin.
 */
async function readBody(args: ParsedCommandArgs, context: CommandContext): Promise<string | undefined> {
  const body = stringOption(args, 'body');
  if (body === '-') {
    return (await context.io.readStdin()).replace(/\r?\n$/, '');
  }
  return body;
}

export function registerNoteCommands(registry: CommandRegistry): void {
  registry.register({
    name: 'add',
    usage: 'notetaker add <title> [--body <text>|-] [--tags a,b]',
    summary: 'Create a note',
    options: { body: { type: 'string', short: 'b' }, tags: { type: 'string', short: 't' } },
    mutates: true,
    async run(args, context) {
      const title = requirePositional(args, 0, 'title', this.usage);
      const body = (await readBody(args, context)) ?? '';
      const tags = parseTagList(stringOption(args, 'tags') ?? '');

      const { note: noteService } = await context.services();
      const note = await noteService.create(title, body, tags);
      context.io.out(`Created note ${shortId(note.id)}: ${note.title}`);
    },
  });

  registry.register({
    name: 'list',
    usage: 'notetaker list [--tag <tag>]',
    summary: 'List notes in the order they were created',
    options: { tag: { type: 'string' } },
    async run(args, context) {
      const { note: noteService } = await context.services();
      const tag = stringOption(args, 'tag');
      const notes = tag === undefined
        ? noteService.list()
        : noteService.list().filter(note => note.tags.some(candidate => candidate.toLowerCase() === tag.trim().toLowerCase()));
      formatNoteList(notes, context.settings.config.timezone).forEach(line => context.io.out(line));
    },
  });

  registry.register({
    name: 'view',
    usage: 'notetaker view <id>',
    summary: 'Show a note in full',
    async run(args, context) {
      const { note: noteService } = await context.services();
      const id = noteService.resolveId(requirePositional(args, 0, 'note id', this.usage));
      formatNoteDetail(noteService.get(id), context.settings.config.timezone).forEach(line => context.io.out(line));
    },
  });

  registry.register({
    name: 'edit',
    usage: 'notetaker edit <id> [--title <text>] [--body <text>|-] [--tags a,b]',
    summary: 'Change the title, body or tags of a note',
    options: {
      title: { type: 'string' },
      body: { type: 'string', short: 'b' },
      tags: { type: 'string', short: 't' },
    },
    mutates: true,
    async run(args, context) {
      const idOrPrefix = requirePositional(args, 0, 'note id', this.usage);
      const tags = stringOption(args, 'tags');
      const fields: UpdateNotePayload = {
        title: stringOption(args, 'title'),
        body: await readBody(args, context),
        tags: tags === undefined ? undefined : parseTagList(tags),
      };

      const { note: noteService } = await context.services();
      const note = await noteService.update(noteService.resolveId(idOrPrefix), fields);
      context.io.out(`Updated note ${shortId(note.id)}: ${note.title}`);
    },
  });

  registry.register({
    name: 'delete',
    usage: 'notetaker delete <id>',
    summary: 'Delete a note and its reminder',
    mutates: true,
    async run(args, context) {
      const { note: noteService } = await context.services();
      const id = noteService.resolveId(requirePositional(args, 0, 'note id', this.usage));
      const { title } = noteService.get(id);
      await noteService.delete(id);
      context.io.out(`Deleted note ${shortId(id)}: ${title}`);
    },
  });

  registry.register({
    name: 'search',
    usage: 'notetaker search <query> [--by title,content,tag] [--count]',
    summary: 'Case-insensitive search over titles, bodies and tags',
    options: { by: { type: 'string' }, count: { type: 'boolean' } },
    async run(args, context) {
      const query = args.positionals.join(' ');
      const fields = parseSearchFields(stringOption(args, 'by'));

      const { note: noteService } = await context.services();
      const notes = noteService.search(query, fields);
      if (booleanOption(args, 'count')) {
        context.io.out(String(notes.length));
        return;
      }
      formatNoteList(notes, context.settings.config.timezone).forEach(line => context.io.out(line));
    },
  });
}
