/** Formats the export formatter can render. */
export type ExportFormat = 'html' | 'markdown';

export const FORMAT_EXTENSIONS: Record<ExportFormat, string> = {
  html: 'html',
  markdown: 'md',
};
