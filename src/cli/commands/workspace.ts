import { join } from 'path';
import chalk from 'chalk';
import { UsageError, errorMessage } from '../../errors.js';
import { escapeShellArg } from '../../infra/shell-escape.js';
import { UNBOUNDED_TIMEOUT } from '../../infra/shell.js';
import type { CommandContext } from '../common/context.js';
import { CREATE_PANE_STARTUP_DELAY_MS } from './create.js';

export interface WorkspaceCommandOptions {
  repo?: string;
  issue?: string;
  branch?: string;
}

function ghqRoot(ctx: CommandContext): string {
  try {
    return ctx.executor.exec('ghq root', { timeout: UNBOUNDED_TIMEOUT }).trim();
  } catch (error) {
    throw new Error(`ghq root: ${errorMessage(error)}`, { cause: error });
  }
}

/**
 * New worktree on `branch`, or a worktree of the branch when it already exists.
 * Checkouts of large repositories take as long as they take.
 */
function addWorktree(ctx: CommandContext, repoDir: string, branch: string, worktreeDir: string): void {
  const repo = escapeShellArg(repoDir);
  try {
    ctx.executor.exec(
      `git -C ${repo} worktree add -b ${escapeShellArg(branch)} ${escapeShellArg(worktreeDir)}`,
      { timeout: UNBOUNDED_TIMEOUT },
    );
    return;
  } catch (createError) {
    try {
      ctx.executor.exec(
        `git -C ${repo} worktree add ${escapeShellArg(worktreeDir)} ${escapeShellArg(branch)}`,
        { timeout: UNBOUNDED_TIMEOUT },
      );
    } catch (checkoutError) {
      throw new Error(
        `git worktree add: ${errorMessage(createError)}\n${errorMessage(checkoutError)}`,
        { cause: checkoutError },
      );
    }
  }
}

/**
 * Create a git worktree for a ghq-managed repository and start an agent pane
 * in it. With an issue number the agent is asked to pick the issue up.
 */
export async function workspaceCommand(
  options: WorkspaceCommandOptions,
  agent: string,
  ctx: CommandContext,
): Promise<void> {
  if (!options.repo) {
    throw new UsageError('usage: panewatch workspace --repo <owner/repo> [--issue N] [--branch name]');
  }

  const repoDir = join(ghqRoot(ctx), 'github.com', options.repo);
  if (!ctx.storage.exists(repoDir)) {
    throw new Error(`repository not found: ${repoDir}`);
  }

  let branch = options.branch;
  if (!branch) {
    if (!options.issue) {
      throw new UsageError('either --branch or --issue must be specified');
    }
    branch = `issue-${options.issue}`;
  }

  const worktreeDir = join(repoDir, '.worktrees', branch);
  addWorktree(ctx, repoDir, branch, worktreeDir);

  let paneId: string;
  try {
    paneId = ctx.tmux.createPane({ command: agent, dir: worktreeDir });
  } catch (error) {
    throw new Error(`creating pane: ${errorMessage(error)}`, { cause: error });
  }

  const title = options.issue ? `#${options.issue}` : branch;
  try {
    ctx.tmux.renamePane(paneId, title);
  } catch (error) {
    ctx.print(chalk.yellow(`⚠️ Could not set pane title: ${errorMessage(error)}`));
  }

  ctx.print('Created workspace:');
  ctx.print(`  Worktree: ${worktreeDir}`);
  ctx.print(`  Branch:   ${branch}`);
  ctx.print(`  Pane:     ${paneId}`);

  if (options.issue) {
    await ctx.sleep(CREATE_PANE_STARTUP_DELAY_MS);
    await ctx.tmux.sendText(paneId, `gh issue view ${options.issue} to review the issue and start working on it`);
    ctx.print(`  Issue:    #${options.issue} (sent to pane)`);
  }
}
