import { errorMessage } from '../../errors.js';
import type { CommandContext } from '../common/context.js';

export const DEFAULT_DIFF_LINES = 20;

function captureWithContext(paneId: string, lines: number, ctx: CommandContext): string {
  try {
    return ctx.tmux.captureScrollback(paneId, lines);
  } catch (error) {
    throw new Error(`capturing pane ${paneId}: ${errorMessage(error)}`, { cause: error });
  }
}

/** Print the tails of two panes one after the other. */
export function diffCommand(first: string, second: string, lines: number, ctx: CommandContext): void {
  const firstOutput = captureWithContext(first, lines, ctx);
  const secondOutput = captureWithContext(second, lines, ctx);

  ctx.print(`=== Pane ${first} ===`);
  ctx.print(firstOutput);
  ctx.print('');
  ctx.print(`=== Pane ${second} ===`);
  ctx.print(secondOutput);
}
