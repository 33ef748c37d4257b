/**
 * Pane registry
 * Turns a raw tmux pane listing into the panes that host a coding agent
 */

import type { PaneRecord } from '../types/index.js';
import type { ProcessLookup } from '../types/interfaces.js';
import { AgentRegistry, agentRegistry as defaultAgentRegistry } from '../agents/index.js';

export class PaneRegistryBuilder {
  constructor(
    private lookup: ProcessLookup,
    private agents: AgentRegistry = defaultAgentRegistry,
    private now: () => Date = () => new Date(),
  ) {}

  /**
   * Rows are `id \t command \t pid [\t dir]`. A pane whose own command is an
   * agent is taken as is; any other pane costs one process-tree lookup and is
   * dropped when that finds nothing. Input order is preserved.
   */
  build(rawListing: string): PaneRecord[] {
    const discoveredAt = this.now();
    const panes: PaneRecord[] = [];

    for (const line of rawListing.trim().split('\n')) {
      if (line === '') continue;
      const fields = line.split('\t');
      if (fields.length < 3) continue;

      const [id, paneCommand, processId] = fields;
      const workingDirectory = fields.length >= 4 ? fields[3] : '';

      let command: string | undefined = paneCommand;
      if (!this.agents.isTargetCommand(paneCommand)) {
        command = this.lookup.findTargetDescendant(processId);
        if (!command) continue;
      }

      panes.push({
        id,
        command,
        processId,
        workingDirectory,
        lastOutputSnapshot: '',
        lastChangeAt: new Date(discoveredAt.getTime()),
      });
    }

    return panes;
  }
}

export function buildPaneRegistry(rawListing: string, lookup: ProcessLookup): PaneRecord[] {
  return new PaneRegistryBuilder(lookup).build(rawListing);
}
