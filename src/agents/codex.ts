/**
 * Codex (OpenAI) agent adapter
 */

import { BaseAgentAdapter, type AgentConfig } from './base.js';

const codexConfig: AgentConfig = {
  name: 'codex',
  displayName: 'Codex',
  command: 'codex',
};

export class CodexAdapter extends BaseAgentAdapter {
  constructor() {
    super(codexConfig);
  }
}

export const codexAdapter = new CodexAdapter();
