import type { CommandContext } from '../common/context.js';

export const DEFAULT_CAPTURE_LINES = 10;
export const DEFAULT_HISTORY_LINES = 1000;

/** Print the last `lines` lines of a pane (`capture` and `history`). */
export function captureCommand(paneId: string, lines: number, ctx: CommandContext): void {
  ctx.print(ctx.tmux.captureScrollback(paneId, lines));
}
