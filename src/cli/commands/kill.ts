import chalk from 'chalk';
import { errorMessage } from '../../errors.js';
import type { CommandContext } from '../common/context.js';
import { NO_PANES_MESSAGE } from './panes.js';

export function killCommand(paneId: string, ctx: CommandContext): void {
  ctx.tmux.killPane(paneId);
  ctx.print(`Killed pane ${paneId}`);
}

export function killAllCommand(ctx: CommandContext): void {
  const panes = ctx.discovery.discover();
  if (panes.length === 0) {
    ctx.print(chalk.gray(NO_PANES_MESSAGE));
    return;
  }

  for (const pane of panes) {
    try {
      ctx.tmux.killPane(pane.id);
    } catch (error) {
      ctx.print(chalk.red(`Error killing pane ${pane.id}: ${errorMessage(error)}`));
      continue;
    }
    ctx.print(`Killed pane ${pane.id} (${pane.command})`);
  }
}
