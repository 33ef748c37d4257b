/**
 * Scan loop
 * Periodically re-discovers agent panes, captures their tail and reports the
 * ones whose output has stopped changing
 */

import type { PaneRecord } from '../types/index.js';
import type { IPaneSource } from '../types/interfaces.js';
import { errorMessage } from '../errors.js';
import { formatDuration, truncateToSeconds } from '../config/duration.js';
import { idleFor, isIdle } from './detector.js';
import type { WatchLogger } from './watch-logger.js';

/** Tail length compared between ticks; independent of any `--lines` flag. */
export const WATCH_CAPTURE_LINES = 10;

export interface PaneSet {
  discover(): PaneRecord[];
}

export interface PaneWatcherOptions {
  discovery: PaneSet;
  source: Pick<IPaneSource, 'capturePaneTail'>;
  logger: WatchLogger;
  scanIntervalMs: number;
  idleThresholdMs: number;
  now?: () => Date;
}

interface TrackState {
  snapshot: string;
  lastChangeAt: Date;
}

export interface TickReport {
  /** False when the pane listing failed and the tick was skipped. */
  listed: boolean;
  panes: PaneRecord[];
  idle: PaneRecord[];
}

/** Longest delay a single timer can hold; larger values fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Resolves `true` after `ms`, or `false` as soon as `signal` aborts. Delays
 * beyond a single timer's range are waited out in chained steps.
 */
export function waitForTick(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return Promise.resolve(false);
  return new Promise((resolve) => {
    let remaining = ms;
    let timer: ReturnType<typeof setTimeout> | undefined;
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const schedule = () => {
      const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
      remaining -= step;
      timer = setTimeout(() => {
        if (remaining > 0) {
          schedule();
          return;
        }
        signal?.removeEventListener('abort', onAbort);
        resolve(true);
      }, step);
    };
    schedule();
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export class PaneWatcher {
  private states: Map<string, TrackState> = new Map();
  private readonly now: () => Date;

  constructor(private options: PaneWatcherOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Tick every `scanIntervalMs` until `signal` aborts. Ticks never overlap: a
   * slow tick only delays the next one.
   */
  async run(signal?: AbortSignal): Promise<void> {
    const { logger, scanIntervalMs, idleThresholdMs } = this.options;
    logger.info(
      `watching tmux panes (scan: ${formatDuration(scanIntervalMs)}, idle threshold: ${formatDuration(idleThresholdMs)})`,
    );

    while (!signal?.aborted) {
      const fired = await waitForTick(scanIntervalMs, signal);
      if (!fired || signal?.aborted) break;
      this.tick();
    }
  }

  tick(): TickReport {
    const { discovery, source, logger, idleThresholdMs } = this.options;

    let panes: PaneRecord[];
    try {
      panes = discovery.discover();
    } catch (error) {
      logger.warn(`failed to list panes: ${errorMessage(error)}`);
      return { listed: false, panes: [], idle: [] };
    }

    this.forgetMissing(panes);

    const idle: PaneRecord[] = [];
    for (const pane of panes) {
      let output: string;
      try {
        output = source.capturePaneTail(pane.id, WATCH_CAPTURE_LINES);
      } catch (error) {
        logger.warn(`failed to capture pane ${pane.id}: ${errorMessage(error)}`);
        continue;
      }

      const now = this.now();
      const state = this.track(pane.id, output, now);
      pane.lastOutputSnapshot = state.snapshot;
      pane.lastChangeAt = state.lastChangeAt;

      if (isIdle(pane, idleThresholdMs, now)) {
        idle.push(pane);
        const elapsed = truncateToSeconds(idleFor(pane, now));
        logger.idle(`pane ${pane.id} (${pane.command}) idle for ${formatDuration(elapsed)}`);
      }
    }

    return { listed: true, panes, idle };
  }

  private track(paneId: string, output: string, now: Date): TrackState {
    const previous = this.states.get(paneId);
    if (previous && previous.snapshot === output) {
      return previous;
    }
    const next: TrackState = { snapshot: output, lastChangeAt: now };
    this.states.set(paneId, next);
    return next;
  }

  /** A pane that left the set starts fresh if its id shows up again. */
  private forgetMissing(panes: PaneRecord[]): void {
    const present = new Set(panes.map((pane) => pane.id));
    for (const paneId of this.states.keys()) {
      if (!present.has(paneId)) {
        this.states.delete(paneId);
      }
    }
  }
}

/** The part of `process` the signal controller listens on. */
export interface SignalSource {
  once(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  off(event: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface SignalController {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Abort on SIGINT / SIGTERM, logging which signal stopped the watcher. An
 * optional parent signal (an outer cancellation) aborts it as well.
 */
export function createSignalController(
  logger: WatchLogger,
  parent?: AbortSignal,
  proc: SignalSource = process,
): SignalController {
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.info(`received ${signal}, shutting down`);
    controller.abort();
  };
  const onParentAbort = () => controller.abort();

  proc.once('SIGINT', onSignal);
  proc.once('SIGTERM', onSignal);
  if (parent?.aborted) {
    controller.abort();
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      proc.off('SIGINT', onSignal);
      proc.off('SIGTERM', onSignal);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
