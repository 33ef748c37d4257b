/**
 * Base agent adapter
 * Every coding agent CLI that panewatch recognises in a pane is an adapter
 */

import type { ICommandExecutor } from '../types/interfaces.js';
import { ShellCommandExecutor } from '../infra/shell.js';
import { escapeShellArg } from '../infra/shell-escape.js';

export interface AgentConfig {
  name: string;
  displayName: string;
  /** Executable base name as it appears in `ps` / `pane_current_command`. */
  command: string;
}

export abstract class BaseAgentAdapter {
  readonly config: AgentConfig;

  constructor(config: AgentConfig) {
    this.config = config;
  }

  /**
   * Check if the agent CLI is installed on this system
   */
  isInstalled(executor?: ICommandExecutor): boolean {
    const exec = executor || new ShellCommandExecutor();
    try {
      exec.execVoid(`command -v ${escapeShellArg(this.config.command)}`, { stdio: 'ignore' });
      return true;
    } catch {
      return false;
    }
  }
}

export type AgentType = 'claude' | 'codex' | string;

/**
 * Final path segment of a process command (`/opt/bin/codex` -> `codex`).
 */
export function commandBaseName(command: string): string {
  const slash = command.lastIndexOf('/');
  return slash >= 0 ? command.slice(slash + 1) : command;
}

/**
 * Registry for all available agent adapters
 */
export class AgentRegistry {
  private adapters: Map<AgentType, BaseAgentAdapter> = new Map();

  register(adapter: BaseAgentAdapter): void {
    this.adapters.set(adapter.config.name, adapter);
  }

  get(name: AgentType): BaseAgentAdapter | undefined {
    return this.adapters.get(name);
  }

  getAll(): BaseAgentAdapter[] {
    return Array.from(this.adapters.values());
  }

  getByCommand(command: string): BaseAgentAdapter | undefined {
    const base = commandBaseName(command);
    return this.getAll().find((adapter) => adapter.config.command === base);
  }

  /**
   * Exact, case-sensitive match of the command's base name against the
   * registered agent executables. `node` wrapping an agent is not a match.
   */
  isTargetCommand(command: string): boolean {
    return this.getByCommand(command) !== undefined;
  }
}
