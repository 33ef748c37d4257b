import chalk from 'chalk';
import type { CommandContext } from '../common/context.js';

export function agentsCommand(ctx: CommandContext): void {
  ctx.print(chalk.cyan('\n🤖 Recognised coding agents:\n'));
  for (const adapter of ctx.agents.getAll()) {
    const installed = adapter.isInstalled(ctx.executor);
    ctx.print(chalk.white(`  ${adapter.config.displayName}`));
    ctx.print(chalk.gray(`    Command: ${adapter.config.command}`));
    ctx.print(installed ? chalk.green('    Installed: yes') : chalk.gray('    Installed: no'));
    ctx.print('');
  }
}
