/**
 * Claude Code agent adapter
 */

import { BaseAgentAdapter, type AgentConfig } from './base.js';

const claudeConfig: AgentConfig = {
  name: 'claude',
  displayName: 'Claude Code',
  command: 'claude',
};

export class ClaudeAdapter extends BaseAgentAdapter {
  constructor() {
    super(claudeConfig);
  }
}

export const claudeAdapter = new ClaudeAdapter();
