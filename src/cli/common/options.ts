import type { Argv } from 'yargs';
import { ParseError } from '../../errors.js';
import { parseDuration } from '../../config/duration.js';

export function addAgentOptions<T>(y: Argv<T>) {
  return y
    .option('claude', {
      type: 'boolean',
      describe: 'Use claude for this invocation',
      global: true,
    })
    .option('codex', {
      type: 'boolean',
      describe: 'Use codex for this invocation',
      global: true,
    })
    .conflicts('claude', 'codex');
}

export function addLinesOption<T>(y: Argv<T>, defaultLines: number) {
  return y.option('lines', {
    alias: 'n',
    type: 'string',
    default: String(defaultLines),
    describe: 'Number of lines to capture',
  });
}

export function parseLinesFlag(value: string | undefined, defaultLines: number): number {
  if (value === undefined) return defaultLines;
  if (!/^\d+$/.test(value.trim())) {
    throw new ParseError(`invalid --lines value: ${value}`);
  }
  return parseInt(value, 10);
}

export function parseDurationFlag(value: string | undefined, flag: string, fallback: number): number {
  if (value === undefined) return fallback;
  try {
    return parseDuration(value);
  } catch (error) {
    throw new ParseError(`invalid --${flag} value: ${value}`, { cause: error });
  }
}

/** A scan interval of zero would rescan tmux back to back. */
export function parseScanIntervalFlag(value: string | undefined, fallback: number): number {
  const ms = parseDurationFlag(value, 'scan', fallback);
  if (ms <= 0) {
    throw new ParseError(`invalid --scan value: ${value}: must be greater than zero`);
  }
  return ms;
}
