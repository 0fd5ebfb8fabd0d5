import fs from 'node:fs';
import path from 'node:path';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Writes a copy of a plain-text file as `<tempDirectory>/<basename>.html`, the
 * text escaped inside a `<pre>` block so it prints as it reads.
 * Returns the path of the copy.
 */
export async function preWrapFile(file: string, tempDirectory: string): Promise<string> {
  const text = await fs.promises.readFile(file, 'utf8');
  const name = path.basename(file);
  const html = [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(name)}</title>`,
    '<style>pre { white-space: pre-wrap; word-wrap: break-word; }</style>',
    '</head>',
    '<body>',
    `<pre>${escapeHtml(text)}</pre>`,
    '</body>',
    '</html>',
    '',
  ].join('\n');
  const output = path.join(tempDirectory, `${name}.html`);
  await fs.promises.writeFile(output, html, 'utf8');
  return output;
}
