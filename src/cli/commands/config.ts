import chalk from 'chalk';
import type { CommandContext } from '../common/context.js';
import { formatDuration } from '../../config/duration.js';
import { parseDurationFlag, parseScanIntervalFlag } from '../common/options.js';
import type { StoredConfig } from '../../config/index.js';

export interface ConfigCommandOptions {
  show?: boolean;
  defaultAgent?: string;
  idle?: string;
  scan?: string;
}

export function configCommand(options: ConfigCommandOptions, ctx: CommandContext): void {
  const updates: Partial<StoredConfig> = {};

  if (options.defaultAgent !== undefined) {
    const agent = options.defaultAgent.trim();
    if (!agent) {
      throw new Error('default agent must not be empty');
    }
    if (!ctx.agents.get(agent)) {
      ctx.print(chalk.yellow(`⚠️ '${agent}' is not a recognised agent; its panes will not be discovered.`));
    }
    updates.defaultAgent = agent;
  }
  if (options.idle !== undefined) {
    parseDurationFlag(options.idle, 'idle', 0);
    updates.idleThreshold = options.idle.trim();
  }
  if (options.scan !== undefined) {
    parseScanIntervalFlag(options.scan, 0);
    updates.scanInterval = options.scan.trim();
  }

  if (Object.keys(updates).length > 0) {
    ctx.configManager.saveConfig(updates);
    if (updates.defaultAgent) ctx.print(chalk.green(`✅ Default agent set to ${updates.defaultAgent}`));
    if (updates.idleThreshold) ctx.print(chalk.green(`✅ Idle threshold set to ${updates.idleThreshold}`));
    if (updates.scanInterval) ctx.print(chalk.green(`✅ Scan interval set to ${updates.scanInterval}`));
    if (!options.show) return;
  }

  const config = ctx.configManager.config;
  ctx.print(chalk.cyan('\n📋 Current configuration:\n'));
  ctx.print(chalk.gray(`   Config file: ${ctx.configManager.getConfigPath()}`));
  ctx.print(chalk.gray(`   Default agent: ${config.defaultAgent}`));
  ctx.print(chalk.gray(`   Idle threshold: ${formatDuration(config.idleThresholdMs)}`));
  ctx.print(chalk.gray(`   Scan interval: ${formatDuration(config.scanIntervalMs)}`));
  ctx.print(chalk.gray(`   Log directory: ${config.logDir}`));
  ctx.print('');
}
