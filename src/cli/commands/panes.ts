import chalk from 'chalk';
import type { CommandContext } from '../common/context.js';
import { formatTable, shortDir } from '../common/format.js';
import { gitBranch } from '../common/git.js';

export const NO_PANES_MESSAGE = 'No coding agent panes found';

export function panesCommand(ctx: CommandContext): void {
  const panes = ctx.discovery.discover();
  if (panes.length === 0) {
    ctx.print(chalk.gray(NO_PANES_MESSAGE));
    return;
  }

  const rows = [
    ['PANE', 'COMMAND', 'DIR', 'BRANCH'],
    ...panes.map((pane) => [
      pane.id,
      pane.command,
      shortDir(pane.workingDirectory),
      gitBranch(ctx.executor, pane.workingDirectory),
    ]),
  ];
  for (const line of formatTable(rows)) {
    ctx.print(line);
  }
}
