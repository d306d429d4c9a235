import { marked } from 'marked';
import { UnsupportedFormatError } from './base/ServiceError';
import { FORMAT_EXTENSIONS, type ExportFormat, type Note } from '../shared/types';

const FORMAT_ALIASES: Record<string, ExportFormat> = {
  html: 'html',
  htm: 'html',
  markdown: 'markdown',
  md: 'markdown',
};

const HTML_STYLE = `
    body { font-family: Arial, sans-serif; line-height: 1.6; max-width: 800px; margin: 0 auto; padding: 20px; color: #222; }
    article + article { border-top: 1px solid #ddd; margin-top: 40px; padding-top: 20px; }
    h1 { color: #333; }
    .meta { color: #666; font-size: 0.9em; }
    .content { margin-top: 20px; }
    .tags { margin-top: 20px; color: #0066cc; }
    pre { background: #f6f8fa; padding: 12px; overflow-x: auto; }`;

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Maps user input such as "md" or "HTML" to a format.
 * @throws UnsupportedFormatError for anything else
 */
export function parseExportFormat(input: string): ExportFormat {
  const format = FORMAT_ALIASES[input.trim().toLowerCase()];
  if (!format) {
    throw new UnsupportedFormatError(input);
  }
  return format;
}

function renderMarkdownBody(body: string): string {
  const rendered = marked.parse(body, { async: false, gfm: true, breaks: true });
  if (typeof rendered !== 'string') {
    throw new Error('Markdown renderer returned asynchronously');
  }
  return rendered.trim();
}

function renderHtmlNote(note: Note): string {
  const tags = note.tags.length > 0 ? note.tags.map(escapeHtml).join(', ') : '(none)';
  return [
    '  <article>',
    `    <h1>${escapeHtml(note.title)}</h1>`,
    '    <div class="meta">',
    `      Created: ${escapeHtml(note.createdAt)}<br>`,
    `      Modified: ${escapeHtml(note.updatedAt)}`,
    '    </div>',
    '    <div class="content">',
    renderMarkdownBody(note.body),
    '    </div>',
    `    <div class="tags">Tags: ${tags}</div>`,
    '  </article>',
  ].join('\n');
}

function renderHtml(notes: readonly Note[]): string {
  const title = notes.length === 1 ? escapeHtml(notes[0].title) : `Notes (${notes.length})`;
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '  <meta charset="UTF-8">',
    `  <title>${title}</title>`,
    `  <style>${HTML_STYLE}\n  </style>`,
    '</head>',
    '<body>',
    ...notes.map(renderHtmlNote),
    '</body>',
    '</html>',
    '',
  ].join('\n');
}

function renderMarkdownNote(note: Note): string {
  const tags = note.tags.length > 0 ? note.tags.join(', ') : '(none)';
  return [
    `# ${note.title}`,
    '',
    `**Created:** ${note.createdAt}  `,
    `**Modified:** ${note.updatedAt}  `,
    '',
    note.body,
    '',
    `**Tags:** ${tags}`,
  ].join('\n');
}

function renderMarkdown(notes: readonly Note[]): string {
  return `${notes.map(renderMarkdownNote).join('\n\n---\n\n')}\n`;
}

/**
 * Stateless rendering of a note set. Writing the result anywhere is the
 * caller's job.
 */
export class ExportService {
  export(notes: readonly Note[], format: string): string {
    switch (parseExportFormat(format)) {
      case 'html':
        return renderHtml(notes);
      case 'markdown':
        return renderMarkdown(notes);
    }
  }

  /**
   * `note_<first 8 of id>_<Title_With_Underscores>.<ext>`, with characters
   * that are unsafe in file names dropped.
   */
  defaultFileName(note: Note, format: string): string {
    const extension = FORMAT_EXTENSIONS[parseExportFormat(format)];
    const safeTitle = note.title
      .trim()
      .replace(/\s+/g, '_')
      .replace(/[^\w.-]/g, '')
      .slice(0, 60) || 'untitled';
    return `note_${note.id.slice(0, 8)}_${safeTitle}.${extension}`;
  }
}
