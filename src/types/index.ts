/**
 * TypeScript type definitions
 */

export * from './interfaces.js';

export interface ProcessEntry {
  pid: string;
  parentId: string;
  commandName: string;
}

/** Parent pid -> direct children, in process-table order. */
export type ProcessTree = Map<string, ProcessEntry[]>;

export interface PaneRecord {
  /** tmux pane id, e.g. `%3` */
  id: string;
  /** Target command hosted by the pane (`claude`, `codex`) */
  command: string;
  processId: string;
  workingDirectory: string;
  lastOutputSnapshot: string;
  lastChangeAt: Date;
}

export interface PanewatchConfig {
  /** Agent command started by `create`, `restart` and `workspace`. */
  defaultAgent: string;
  idleThresholdMs: number;
  scanIntervalMs: number;
  logDir: string;
}

export type PaneStatus = 'active' | 'idle';
