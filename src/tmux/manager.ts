/**
 * tmux access for pane listing, capture and the pane side effects used by
 * the CLI (send, create, kill, rename)
 */

import type { ExecOptions, ICommandExecutor, IPaneSource } from '../types/interfaces.js';
import { LARGE_OUTPUT_MAX_BUFFER, ShellCommandExecutor, UNBOUNDED_TIMEOUT } from '../infra/shell.js';
import { escapeShellArg } from '../infra/shell-escape.js';
import { CaptureError, DiscoveryError, errorMessage } from '../errors.js';

export const PANE_LIST_FORMAT = '#{pane_id}\t#{pane_current_command}\t#{pane_pid}\t#{pane_current_path}';

/** Literal `C-m`, `Enter` or `\n` left at the end of text meant for send-keys. */
const TRAILING_SUBMIT_KEYS = /(\s*(C-m|Enter|\\n))+\s*$/i;

export interface CreatePaneOptions {
  command: string;
  /** Working directory; inherits tmux's default when omitted. */
  dir?: string;
  /** Target session; current session when omitted. */
  session?: string;
  split?: 'h' | 'v';
  newWindow?: boolean;
}

/**
 * Collapse newlines to spaces and drop trailing submit keys; send-keys
 * submits on its own.
 */
export function sanitizeKeys(keys: string): string {
  return keys
    .replace(/\r\n/g, ' ')
    .replace(/\n/g, ' ')
    .replace(/\r/g, ' ')
    .replace(TRAILING_SUBMIT_KEYS, '')
    .trim();
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class TmuxManager implements IPaneSource {
  constructor(
    private executor: ICommandExecutor = new ShellCommandExecutor(),
    private submitDelayMs: number = 100,
  ) {}

  isInstalled(): boolean {
    try {
      this.executor.execVoid('tmux -V', { stdio: ['ignore', 'pipe', 'ignore'] });
      return true;
    } catch {
      return false;
    }
  }

  listPanesRaw(): string {
    try {
      return this.executor.exec(`tmux list-panes -a -F ${escapeShellArg(PANE_LIST_FORMAT)}`);
    } catch (error) {
      throw new DiscoveryError(`tmux list-panes: ${errorMessage(error)}`, { cause: error });
    }
  }

  capturePaneTail(paneId: string, lineCount: number): string {
    return this.capture(paneId, lineCount);
  }

  /**
   * Capture for the one-off CLI commands: no time limit and room for
   * thousands of wide lines.
   */
  captureScrollback(paneId: string, lineCount: number): string {
    return this.capture(paneId, lineCount, { timeout: UNBOUNDED_TIMEOUT, maxBuffer: LARGE_OUTPUT_MAX_BUFFER });
  }

  private capture(paneId: string, lineCount: number, options?: ExecOptions): string {
    try {
      const output = this.executor.exec(
        `tmux capture-pane -p -t ${escapeShellArg(paneId)} -S -${lineCount}`,
        options,
      );
      return output.trim();
    } catch (error) {
      throw new CaptureError(paneId, `tmux capture-pane ${paneId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Type text into a pane literally, then press Enter twice (agent TUIs
   * swallow the first one while the paste settles).
   */
  async sendText(paneId: string, text: string): Promise<void> {
    const keys = sanitizeKeys(text);
    if (!keys) return;

    this.run(
      `tmux send-keys -t ${escapeShellArg(paneId)} -l -- ${escapeShellArg(keys)}`,
      `tmux send-keys -l to ${paneId}`,
    );

    await delay(this.submitDelayMs);

    for (let i = 0; i < 2; i++) {
      this.run(`tmux send-keys -t ${escapeShellArg(paneId)} C-m`, `tmux send-keys (enter) to ${paneId}`);
    }
  }

  /** Send tmux key names (`C-c`, `Enter`) rather than literal text. */
  sendRawKeys(paneId: string, ...keys: string[]): void {
    const args = keys.map((key) => escapeShellArg(key)).join(' ');
    this.run(`tmux send-keys -t ${escapeShellArg(paneId)} ${args}`, `tmux send-keys ${paneId}`);
  }

  /** Returns the new pane id, e.g. `%99`. */
  createPane(options: CreatePaneOptions): string {
    const args: string[] = options.newWindow
      ? ['new-window']
      : ['split-window', options.split === 'v' ? '-v' : '-h'];
    if (options.session) {
      args.push('-t', escapeShellArg(options.session));
    }
    args.push('-P', '-F', escapeShellArg('#{pane_id}'));
    if (options.dir) {
      args.push('-c', escapeShellArg(options.dir));
    }
    args.push(escapeShellArg(options.command));

    const output = this.run(`tmux ${args.join(' ')}`, `tmux ${args[0]}`);
    return output.trim();
  }

  killPane(paneId: string): void {
    this.run(`tmux kill-pane -t ${escapeShellArg(paneId)}`, `tmux kill-pane ${paneId}`);
  }

  renamePane(paneId: string, title: string): void {
    this.run(
      `tmux select-pane -t ${escapeShellArg(paneId)} -T ${escapeShellArg(title)}`,
      `tmux select-pane -T ${paneId}`,
    );
  }

  private run(command: string, context: string): string {
    try {
      return this.executor.exec(command, { stdio: ['ignore', 'pipe', 'pipe'] });
    } catch (error) {
      throw new Error(`${context}: ${errorMessage(error)}`, { cause: error });
    }
  }
}
