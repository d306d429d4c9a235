import fs from 'fs-extra';
import path from 'path';
import { format as formatDate } from 'date-fns';
import { FORMAT_EXTENSIONS } from '../../shared/types';
import { parseExportFormat } from '../../services/ExportService';
import { requirePositional, stringOption, type CommandRegistry } from '../CommandRegistry';

export function registerExportCommand(registry: CommandRegistry): void {
  registry.register({
    name: 'export',
    usage: 'notetaker export <id|all> --format html|markdown [--out <path>|-]',
    summary: 'Export one note or all notes as HTML or Markdown',
    options: { format: { type: 'string', short: 'f' }, out: { type: 'string', short: 'o' } },
    async run(args, context) {
      const target = requirePositional(args, 0, "note id or 'all'", this.usage);
      const format = parseExportFormat(stringOption(args, 'format') ?? 'markdown');

      const { note: noteService, export: exportService } = await context.services();
      const notes = target === 'all' ? noteService.list() : [noteService.get(noteService.resolveId(target))];
      const rendered = exportService.export(notes, format);

      const out = stringOption(args, 'out');
      if (out === '-') {
        context.io.out(rendered.replace(/\n$/, ''));
        return;
      }

      const fileName = out ?? (notes.length === 1 && target !== 'all'
        ? exportService.defaultFileName(notes[0], format)
        : `notes_export_${formatDate(context.now(), 'yyyyMMdd_HHmmss')}.${FORMAT_EXTENSIONS[format]}`);
      const filePath = path.resolve(fileName);

      await fs.outputFile(filePath, rendered, 'utf-8');
      context.io.out(`Exported ${notes.length} note(s) to ${filePath}`);
    },
  });
}
