import type { CommandContext } from '../common/context.js';

export function renameCommand(paneId: string, words: string[], ctx: CommandContext): void {
  const title = words.join(' ');
  ctx.tmux.renamePane(paneId, title);
  ctx.print(`Renamed pane ${paneId} to ${JSON.stringify(title)}`);
}
