import type { ICommandExecutor } from '../../types/interfaces.js';
import { escapeShellArg } from '../../infra/shell-escape.js';

/** Current branch of a checkout, or '' when it has none or is not a repo. */
export function gitBranch(executor: ICommandExecutor, dir: string): string {
  if (!dir) return '';
  try {
    return executor.exec(`git -C ${escapeShellArg(dir)} branch --show-current`).trim();
  } catch {
    return '';
  }
}
