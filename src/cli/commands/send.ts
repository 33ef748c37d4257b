import type { CommandContext } from '../common/context.js';

export async function sendCommand(paneId: string, words: string[], ctx: CommandContext): Promise<void> {
  const text = words.join(' ');
  await ctx.tmux.sendText(paneId, text);
  ctx.print(`Sent to pane ${paneId}: ${text}`);
}
