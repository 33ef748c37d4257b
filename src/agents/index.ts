/**
 * Agent adapters registry
 */

export * from './base.js';
export { claudeAdapter, ClaudeAdapter } from './claude.js';
export { codexAdapter, CodexAdapter } from './codex.js';

import { AgentRegistry } from './base.js';
import { claudeAdapter } from './claude.js';
import { codexAdapter } from './codex.js';

export const DEFAULT_AGENT = 'claude';

/**
 * Create a new AgentRegistry with the recognised coding agents registered
 */
export function createAgentRegistry(): AgentRegistry {
  const registry = new AgentRegistry();
  registry.register(claudeAdapter);
  registry.register(codexAdapter);
  return registry;
}

export const agentRegistry = createAgentRegistry();
