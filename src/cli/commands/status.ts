import chalk from 'chalk';
import type { CommandContext } from '../common/context.js';
import { formatTable } from '../common/format.js';
import { paneStatus, summarizeStatus } from '../../capture/detector.js';
import { truncateLastLine } from '../../capture/parser.js';
import { NO_PANES_MESSAGE } from './panes.js';

const STATUS_CAPTURE_LINES = 5;
const LAST_OUTPUT_WIDTH = 60;

export interface StatusCommandOptions {
  short?: boolean;
  idleThresholdMs: number;
}

export function statusCommand(options: StatusCommandOptions, ctx: CommandContext): void {
  const panes = ctx.discovery.discover();
  if (panes.length === 0) {
    ctx.print(chalk.gray(NO_PANES_MESSAGE));
    return;
  }

  for (const pane of panes) {
    try {
      pane.lastOutputSnapshot = ctx.tmux.capturePaneTail(pane.id, STATUS_CAPTURE_LINES);
    } catch {
      // Pane vanished between listing and capture; show it without output.
    }
  }

  const now = ctx.now();
  if (options.short) {
    ctx.print(summarizeStatus(panes, options.idleThresholdMs, now));
    return;
  }

  const rows = [
    ['PANE', 'COMMAND', 'STATUS', 'LAST OUTPUT'],
    ...panes.map((pane) => [
      pane.id,
      pane.command,
      paneStatus(pane, options.idleThresholdMs, now),
      truncateLastLine(pane.lastOutputSnapshot, LAST_OUTPUT_WIDTH),
    ]),
  ];
  for (const line of formatTable(rows)) {
    ctx.print(line);
  }
}
