/**
 * Idle classification from a pane's last output change
 */

import type { PaneRecord, PaneStatus } from '../types/index.js';

export function idleFor(pane: Pick<PaneRecord, 'lastChangeAt'>, now: Date = new Date()): number {
  return now.getTime() - pane.lastChangeAt.getTime();
}

/**
 * A pane is idle once its output has been unchanged for at least
 * `thresholdMs`; the boundary itself counts as idle.
 */
export function isIdle(pane: Pick<PaneRecord, 'lastChangeAt'>, thresholdMs: number, now: Date = new Date()): boolean {
  return idleFor(pane, now) >= thresholdMs;
}

export function paneStatus(pane: Pick<PaneRecord, 'lastChangeAt'>, thresholdMs: number, now: Date = new Date()): PaneStatus {
  return isIdle(pane, thresholdMs, now) ? 'idle' : 'active';
}

/**
 * One-line summary, e.g. `panewatch: 3 active, 1 idle`
 */
export function summarizeStatus(panes: PaneRecord[], thresholdMs: number, now: Date = new Date()): string {
  let active = 0;
  let idle = 0;
  for (const pane of panes) {
    if (isIdle(pane, thresholdMs, now)) {
      idle++;
    } else {
      active++;
    }
  }
  return `panewatch: ${active} active, ${idle} idle`;
}
