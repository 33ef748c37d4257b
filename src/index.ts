/**
 * panewatch - find tmux panes running coding agents and track when they go idle
 */

export * from './types/index.js';
export * from './errors.js';
export { agentRegistry, createAgentRegistry, AgentRegistry, BaseAgentAdapter, commandBaseName } from './agents/index.js';
export { parseProcessListing, buildProcessTree, resolveTargetDescendant, type TargetPredicate } from './process/tree.js';
export { PsProcessTable, ProcessTreeLookup } from './process/table.js';
export { PaneRegistryBuilder, buildPaneRegistry } from './panes/registry.js';
export { PaneDiscovery } from './panes/discovery.js';
export { TmuxManager, sanitizeKeys, PANE_LIST_FORMAT, type CreatePaneOptions } from './tmux/manager.js';
export * from './capture/index.js';
export { ConsoleSink, FileSink, MemorySink } from './infra/log-sinks.js';
export { ShellCommandExecutor } from './infra/shell.js';
export { FileStorage } from './infra/storage.js';
export { SystemEnvironment } from './infra/environment.js';
export {
  ConfigManager,
  resolveActiveAgent,
  DEFAULT_IDLE_THRESHOLD_MS,
  DEFAULT_SCAN_INTERVAL_MS,
  type StoredConfig,
} from './config/index.js';
export { parseDuration, formatDuration } from './config/duration.js';
