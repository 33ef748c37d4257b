import { workspaceCommand } from '../../../src/cli/commands/workspace.js';
import { CREATE_PANE_STARTUP_DELAY_MS } from '../../../src/cli/commands/create.js';
import { UsageError } from '../../../src/errors.js';
import { UNBOUNDED_TIMEOUT } from '../../../src/infra/shell.js';
import { MockStorage, RecordingExecutor } from '../../helpers/fakes.js';
import { testContext } from '../../helpers/context.js';

const REPO_DIR = '/src/github.com/acme/api';

function workspaceContext(executor: RecordingExecutor) {
  const storage = new MockStorage();
  storage.mkdirp(REPO_DIR);
  executor.on('ghq root', '/src\n').on('tmux split-window', '%30\n');
  return testContext({ executor, storage });
}

describe('workspaceCommand', () => {
  it('creates an issue branch worktree and hands the issue to the agent', async () => {
    const executor = new RecordingExecutor();
    const { ctx, sleeps, printed } = workspaceContext(executor);

    await workspaceCommand({ repo: 'acme/api', issue: '42' }, 'claude', ctx);

    expect(executor.commands).toEqual([
      'ghq root',
      `git -C '${REPO_DIR}' worktree add -b 'issue-42' '${REPO_DIR}/.worktrees/issue-42'`,
      `tmux split-window -h -P -F '#{pane_id}' -c '${REPO_DIR}/.worktrees/issue-42' 'claude'`,
      "tmux select-pane -t '%30' -T '#42'",
      "tmux send-keys -t '%30' -l -- 'gh issue view 42 to review the issue and start working on it'",
      "tmux send-keys -t '%30' C-m",
      "tmux send-keys -t '%30' C-m",
    ]);
    expect(sleeps).toEqual([CREATE_PANE_STARTUP_DELAY_MS]);
    expect(printed()).toEqual([
      'Created workspace:',
      `  Worktree: ${REPO_DIR}/.worktrees/issue-42`,
      '  Branch:   issue-42',
      '  Pane:     %30',
      '  Issue:    #42 (sent to pane)',
    ]);
  });

  it('checks out an existing branch when it cannot be created', async () => {
    const executor = new RecordingExecutor().fail(`git -C '${REPO_DIR}' worktree add -b`, 'branch already exists');
    const { ctx, sleeps, printed } = workspaceContext(executor);

    await workspaceCommand({ repo: 'acme/api', branch: 'feature' }, 'codex', ctx);

    expect(executor.commands.slice(1, 5)).toEqual([
      `git -C '${REPO_DIR}' worktree add -b 'feature' '${REPO_DIR}/.worktrees/feature'`,
      `git -C '${REPO_DIR}' worktree add '${REPO_DIR}/.worktrees/feature' 'feature'`,
      `tmux split-window -h -P -F '#{pane_id}' -c '${REPO_DIR}/.worktrees/feature' 'codex'`,
      "tmux select-pane -t '%30' -T 'feature'",
    ]);
    expect(sleeps).toEqual([]);
    expect(printed()).toHaveLength(4);
  });

  it('lets ghq and git worktree run without a time limit', async () => {
    const executor = new RecordingExecutor().fail(`git -C '${REPO_DIR}' worktree add -b`, 'branch already exists');
    const { ctx } = workspaceContext(executor);

    await workspaceCommand({ repo: 'acme/api', branch: 'feature' }, 'claude', ctx);

    expect(executor.calls.slice(0, 3)).toEqual([
      { command: 'ghq root', options: { timeout: UNBOUNDED_TIMEOUT } },
      {
        command: `git -C '${REPO_DIR}' worktree add -b 'feature' '${REPO_DIR}/.worktrees/feature'`,
        options: { timeout: UNBOUNDED_TIMEOUT },
      },
      {
        command: `git -C '${REPO_DIR}' worktree add '${REPO_DIR}/.worktrees/feature' 'feature'`,
        options: { timeout: UNBOUNDED_TIMEOUT },
      },
    ]);
  });

  it('fails when both worktree attempts fail', async () => {
    const executor = new RecordingExecutor().fail(`git -C '${REPO_DIR}' worktree add`, 'not a git repository');
    const { ctx } = workspaceContext(executor);

    await expect(workspaceCommand({ repo: 'acme/api', branch: 'feature' }, 'claude', ctx)).rejects.toThrow(
      'git worktree add: not a git repository\nnot a git repository',
    );
  });

  it('warns but continues when the pane title cannot be set', async () => {
    const executor = new RecordingExecutor().fail('tmux select-pane', 'no such pane');
    const { ctx, printed } = workspaceContext(executor);

    await workspaceCommand({ repo: 'acme/api', branch: 'feature' }, 'claude', ctx);

    expect(printed()[0]).toBe('⚠️ Could not set pane title: tmux select-pane -T %30: no such pane');
    expect(printed()[1]).toBe('Created workspace:');
  });

  it('requires a repository', async () => {
    const { ctx } = testContext();

    await expect(workspaceCommand({ issue: '1' }, 'claude', ctx)).rejects.toBeInstanceOf(UsageError);
  });

  it('requires a branch or an issue', async () => {
    const { ctx } = workspaceContext(new RecordingExecutor());

    await expect(workspaceCommand({ repo: 'acme/api' }, 'claude', ctx)).rejects.toThrow(
      'either --branch or --issue must be specified',
    );
  });

  it('fails for a repository that is not checked out', async () => {
    const { ctx } = workspaceContext(new RecordingExecutor());

    await expect(workspaceCommand({ repo: 'acme/missing', issue: '1' }, 'claude', ctx)).rejects.toThrow(
      'repository not found: /src/github.com/acme/missing',
    );
  });

  it('reports a missing ghq', async () => {
    const executor = new RecordingExecutor().fail('ghq root', 'ghq: command not found');
    const { ctx } = testContext({ executor });

    await expect(workspaceCommand({ repo: 'acme/api', issue: '1' }, 'claude', ctx)).rejects.toThrow(
      'ghq root: ghq: command not found',
    );
  });
});
