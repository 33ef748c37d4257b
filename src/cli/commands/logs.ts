import { join } from 'path';
import { errorMessage } from '../../errors.js';
import type { CommandContext } from '../common/context.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYYMMDD-HHMMSS` in local time. */
export function logFileStamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export interface LogsCommandOptions {
  file?: string;
  lines: number;
}

/** Save a pane's scrollback to a file, by default under the config log dir. */
export function logsCommand(paneId: string, options: LogsCommandOptions, ctx: CommandContext): void {
  const output = ctx.tmux.captureScrollback(paneId, options.lines);

  let file = options.file;
  if (!file) {
    const logDir = ctx.config.logDir;
    if (!ctx.storage.exists(logDir)) {
      ctx.storage.mkdirp(logDir);
    }
    file = join(logDir, `${paneId.replace(/^%/, '')}-${logFileStamp(ctx.now())}.log`);
  }

  try {
    ctx.storage.writeFile(file, output + '\n');
  } catch (error) {
    throw new Error(`writing log file: ${errorMessage(error)}`, { cause: error });
  }
  ctx.print(`Saved pane ${paneId} output (${options.lines} lines) to ${file}`);
}
