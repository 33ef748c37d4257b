import { basename } from 'path';

/**
 * Align rows into columns two spaces apart. The last column is left ragged.
 */
export function formatTable(rows: string[][]): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.slice(0, -1).forEach((cell, i) => {
      widths[i] = Math.max(widths[i] ?? 0, cell.length);
    });
  }
  return rows.map((row) => {
    const last = row.length - 1;
    return row.map((cell, i) => (i < last ? cell.padEnd(widths[i] + 2) : cell)).join('');
  });
}

/**
 * Compact directory label: `owner/repo[/sub]` for checkouts under a
 * `github.com/` tree (ghq layout), otherwise the last path component.
 */
export function shortDir(dir: string): string {
  if (!dir) return '';
  const marker = '/github.com/';
  const i = dir.indexOf(marker);
  if (i >= 0) return dir.slice(i + marker.length);
  return basename(dir);
}
