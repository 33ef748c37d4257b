/**
 * Default ICommandExecutor implementation using child_process.execSync
 */

import { execSync } from 'child_process';
import type { ExecOptions, ICommandExecutor } from '../types/interfaces.js';

/** Bound for calls the scan loop makes, so cancellation is never held up long. */
export const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

/** One-off commands (git checkouts, long scrollback) run to completion. */
export const UNBOUNDED_TIMEOUT = 0;

export const LARGE_OUTPUT_MAX_BUFFER = 256 * 1024 * 1024;

export class ShellCommandExecutor implements ICommandExecutor {
  exec(command: string, options?: ExecOptions): string {
    return execSync(command, {
      encoding: options?.encoding || 'utf-8',
      stdio: options?.stdio || ['ignore', 'pipe', 'pipe'],
      timeout: options?.timeout ?? DEFAULT_COMMAND_TIMEOUT_MS,
      ...(options?.maxBuffer !== undefined ? { maxBuffer: options.maxBuffer } : {}),
    });
  }

  execVoid(command: string, options?: Omit<ExecOptions, 'encoding' | 'maxBuffer'>): void {
    execSync(command, {
      stdio: options?.stdio || 'ignore',
      timeout: options?.timeout ?? DEFAULT_COMMAND_TIMEOUT_MS,
    });
  }
}
