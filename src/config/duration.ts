/**
 * Duration strings used by flags and config: `500ms`, `10s`, `1.5m`, `1h30m`
 */

import { ParseError } from '../errors.js';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60_000,
  h: 3_600_000,
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ms|s|m|h)/y;

export function parseDuration(text: string): number {
  const input = text.trim();
  if (input === '0') return 0;
  if (input === '') {
    throw new ParseError('invalid duration: empty string');
  }

  let total = 0;
  SEGMENT.lastIndex = 0;
  while (SEGMENT.lastIndex < input.length) {
    const start = SEGMENT.lastIndex;
    const match = SEGMENT.exec(input);
    if (!match || match.index !== start) {
      throw new ParseError(`invalid duration: "${text}"`);
    }
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }
  return total;
}

function formatSeconds(seconds: number): string {
  return String(Number(seconds.toFixed(3)));
}

export function formatDuration(ms: number): string {
  if (ms === 0) return '0s';
  if (ms < 1000) return `${ms}ms`;

  const hours = Math.floor(ms / UNIT_MS.h);
  const minutes = Math.floor((ms % UNIT_MS.h) / UNIT_MS.m);
  const seconds = formatSeconds((ms % UNIT_MS.m) / 1000);

  if (hours > 0) return `${hours}h${minutes}m${seconds}s`;
  if (minutes > 0) return `${minutes}m${seconds}s`;
  return `${seconds}s`;
}

export function truncateToSeconds(ms: number): number {
  return Math.floor(ms / 1000) * 1000;
}
