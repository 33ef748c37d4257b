import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import type { CommandContext } from '../common/context.js';
import { NO_PANES_MESSAGE } from './panes.js';

/** Send the same text to every agent pane; one failing pane does not stop the rest. */
export async function broadcastCommand(words: string[], ctx: CommandContext): Promise<void> {
  const text = words.join(' ');
  const panes = ctx.discovery.discover();
  if (panes.length === 0) {
    ctx.print(chalk.gray(NO_PANES_MESSAGE));
    return;
  }

  for (const pane of panes) {
    try {
      await ctx.tmux.sendText(pane.id, text);
    } catch (error) {
      ctx.print(chalk.red(`Error sending to pane ${pane.id}: ${errorMessage(error)}`));
      continue;
    }
    ctx.print(`Sent to pane ${pane.id} (${pane.command})`);
  }
}
