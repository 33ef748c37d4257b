import { errorMessage } from '../../errors.js';
import type { CommandContext } from '../common/context.js';

/** Time for an agent TUI to come up before keys are typed into it. */
export const CREATE_PANE_STARTUP_DELAY_MS = 5000;

export interface CreateCommandOptions {
  command?: string;
  keys?: string;
  session?: string;
  split?: 'h' | 'v';
  newWindow?: boolean;
}

export async function createCommand(
  options: CreateCommandOptions,
  agent: string,
  ctx: CommandContext,
): Promise<void> {
  const command = options.command || agent;
  const paneId = ctx.tmux.createPane({
    command,
    session: options.session,
    split: options.split,
    newWindow: options.newWindow,
  });
  ctx.print(`Created pane ${paneId} (${command})`);

  if (!options.keys) return;

  await ctx.sleep(CREATE_PANE_STARTUP_DELAY_MS);
  try {
    await ctx.tmux.sendText(paneId, options.keys);
  } catch (error) {
    throw new Error(`created pane ${paneId} but failed to send keys: ${errorMessage(error)}`, { cause: error });
  }
  ctx.print(`Sent to pane ${paneId}: ${options.keys}`);
}
