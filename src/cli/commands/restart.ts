import type { CommandContext } from '../common/context.js';

export const RESTART_STEP_DELAY_MS = 500;

/**
 * Interrupt the agent, exit it, and start `agent` again in the same pane.
 */
export async function restartCommand(paneId: string, agent: string, ctx: CommandContext): Promise<void> {
  ctx.tmux.sendRawKeys(paneId, 'C-c');
  await ctx.sleep(RESTART_STEP_DELAY_MS);

  ctx.tmux.sendRawKeys(paneId, '/exit', 'Enter');
  await ctx.sleep(RESTART_STEP_DELAY_MS);

  ctx.tmux.sendRawKeys(paneId, agent, 'Enter');
  ctx.print(`Restarted session in pane ${paneId}`);
}
