/**
 * Collaborators shared by every CLI command, overridable in tests
 */

import type { PanewatchConfig } from '../../types/index.js';
import type { ICommandExecutor, IStorage } from '../../types/interfaces.js';
import { ShellCommandExecutor } from '../../infra/shell.js';
import { FileStorage } from '../../infra/storage.js';
import { TmuxManager } from '../../tmux/manager.js';
import { AgentRegistry, agentRegistry } from '../../agents/index.js';
import { PsProcessTable, ProcessTreeLookup } from '../../process/table.js';
import { PaneRegistryBuilder } from '../../panes/registry.js';
import { PaneDiscovery } from '../../panes/discovery.js';
import type { PaneSet } from '../../capture/watcher.js';
import { ConfigManager } from '../../config/index.js';

export interface CommandContext {
  tmux: TmuxManager;
  discovery: PaneSet;
  executor: ICommandExecutor;
  storage: IStorage;
  configManager: ConfigManager;
  config: PanewatchConfig;
  agents: AgentRegistry;
  print: (line: string) => void;
  now: () => Date;
  sleep: (ms: number) => Promise<void>;
}

export function createCommandContext(overrides: Partial<CommandContext> = {}): CommandContext {
  const executor = overrides.executor ?? new ShellCommandExecutor();
  const storage = overrides.storage ?? new FileStorage();
  const agents = overrides.agents ?? agentRegistry;
  const now = overrides.now ?? (() => new Date());
  const tmux = overrides.tmux ?? new TmuxManager(executor);
  const configManager = overrides.configManager ?? new ConfigManager(storage);

  const discovery = overrides.discovery ?? new PaneDiscovery(
    tmux,
    new PaneRegistryBuilder(
      new ProcessTreeLookup(new PsProcessTable(executor), (command) => agents.isTargetCommand(command)),
      agents,
      now,
    ),
  );

  return {
    tmux,
    discovery,
    executor,
    storage,
    configManager,
    config: overrides.config ?? configManager.config,
    agents,
    print: overrides.print ?? ((line) => console.log(line)),
    now,
    sleep: overrides.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms))),
  };
}
