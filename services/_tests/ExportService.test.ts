import { describe, it, expect } from 'vitest';
import { ExportService, escapeHtml, parseExportFormat } from '../ExportService';
import { UnsupportedFormatError } from '../base/ServiceError';
import type { Note } from '../../shared/types';

const makeNote = (overrides: Partial<Note> = {}): Note => ({
  id: '12345678-aaaa-4bbb-8ccc-000000000000',
  title: 'Groceries',
  body: 'Milk and eggs',
  tags: ['home'],
  createdAt: '2024-01-01T00:00:00.000Z',
  updatedAt: '2024-01-02T00:00:00.000Z',
  reminder: null,
  encrypted: false,
  ...overrides,
});

describe('ExportService', () => {
  const service = new ExportService();

  describe('markdown', () => {
    it('should render a single note', () => {
      expect(service.export([makeNote()], 'markdown')).toBe([
        '# Groceries',
        '',
        '**Created:** 2024-01-01T00:00:00.000Z  ',
        '**Modified:** 2024-01-02T00:00:00.000Z  ',
        '',
        'Milk and eggs',
        '',
        '**Tags:** home',
        '',
      ].join('\n'));
    });

    it('should separate several notes with a rule', () => {
      const output = service.export([makeNote(), makeNote({ title: 'Second', tags: [] })], 'md');

      expect(output).toContain('**Tags:** home\n\n---\n\n# Second\n');
      expect(output.endsWith('**Tags:** (none)\n')).toBe(true);
    });
  });

  describe('html', () => {
    it('should escape titles and render the body as markdown', () => {
      const output = service.export([makeNote({ title: 'Tom & Jerry <3', body: '**bold**', tags: ['a<b'] })], 'HTML');

      expect(output.startsWith('<!DOCTYPE html>\n')).toBe(true);
      expect(output).toContain('  <title>Tom &amp; Jerry &lt;3</title>');
      expect(output).toContain('    <h1>Tom &amp; Jerry &lt;3</h1>');
      expect(output).toContain('<p><strong>bold</strong></p>');
      expect(output).toContain('    <div class="tags">Tags: a&lt;b</div>');
    });

    it('should title a multi-note document by count', () => {
      const output = service.export([makeNote(), makeNote({ id: 'other' })], 'html');

      expect(output).toContain('  <title>Notes (2)</title>');
      expect(output.match(/<article>/g)).toHaveLength(2);
    });
  });

  it('should reject unknown formats', () => {
    expect(() => service.export([makeNote()], 'pdf')).toThrow(UnsupportedFormatError);
    expect(() => parseExportFormat('')).toThrow(UnsupportedFormatError);
  });

  it('should accept format aliases in any case', () => {
    expect(parseExportFormat(' MD ')).toBe('markdown');
    expect(parseExportFormat('htm')).toBe('html');
  });

  it('should escape every HTML-significant character', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe('&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;');
  });

  describe('defaultFileName', () => {
    it('should combine the id prefix and a file-safe title', () => {
      expect(service.defaultFileName(makeNote({ title: 'Shopping list: week 1' }), 'markdown'))
        .toBe('note_12345678_Shopping_list_week_1.md');
    });

    it('should fall back when nothing of the title survives', () => {
      expect(service.defaultFileName(makeNote({ title: '???' }), 'html')).toBe('note_12345678_untitled.html');
    });
  });
});
