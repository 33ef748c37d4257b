/**
 * Helpers for presenting captured pane output
 */

/**
 * Last line of a capture, cut to `maxLength` with a trailing `...`.
 */
export function truncateLastLine(output: string, maxLength: number): string {
  if (output === '') return '';
  const lines = output.split('\n');
  const last = lines[lines.length - 1];
  if (last.length > maxLength) {
    return last.slice(0, maxLength - 3) + '...';
  }
  return last;
}
