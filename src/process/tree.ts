/**
 * Process-tree resolution
 * Finds a coding agent running anywhere below a pane's leading process
 */

import type { ProcessEntry, ProcessTree } from '../types/index.js';
import { agentRegistry, commandBaseName } from '../agents/index.js';

export type TargetPredicate = (command: string) => boolean;

const defaultIsTarget: TargetPredicate = (command) => agentRegistry.isTargetCommand(command);

/**
 * Parse `ps -o pid,ppid,comm` style output. Rows with fewer than three
 * whitespace-separated fields are dropped.
 */
export function parseProcessListing(output: string): ProcessEntry[] {
  const entries: ProcessEntry[] = [];
  for (const line of output.trim().split('\n')) {
    const fields = line.trim().split(/\s+/);
    if (fields.length < 3) continue;
    entries.push({ pid: fields[0], parentId: fields[1], commandName: fields[2] });
  }
  return entries;
}

export function buildProcessTree(entries: ProcessEntry[]): ProcessTree {
  const tree: ProcessTree = new Map();
  for (const entry of entries) {
    const siblings = tree.get(entry.parentId);
    if (siblings) {
      siblings.push(entry);
    } else {
      tree.set(entry.parentId, [entry]);
    }
  }
  return tree;
}

/**
 * Depth-first search below `rootProcessId` for the first target command.
 *
 * Each child is tested before its own subtree is explored, and a sibling is
 * only looked at once the previous sibling's whole subtree came up empty. The
 * winner therefore depends on process-table order, not on depth. Returns the
 * base name of the matching command.
 */
export function resolveTargetDescendant(
  listing: string | ProcessEntry[],
  rootProcessId: string,
  isTarget: TargetPredicate = defaultIsTarget,
): string | undefined {
  const entries = typeof listing === 'string' ? parseProcessListing(listing) : listing;
  const tree = buildProcessTree(entries);

  const stack: ProcessEntry[] = [...(tree.get(rootProcessId) ?? [])].reverse();
  const visited = new Set<string>([rootProcessId]);

  while (stack.length > 0) {
    const current = stack.pop();
    if (!current || visited.has(current.pid)) continue;
    visited.add(current.pid);

    if (isTarget(current.commandName)) {
      return commandBaseName(current.commandName);
    }

    const children = tree.get(current.pid);
    if (!children) continue;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return undefined;
}
