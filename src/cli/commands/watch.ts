import type { LineSink } from '../../types/interfaces.js';
import type { CommandContext } from '../common/context.js';
import { ConsoleSink, FileSink } from '../../infra/log-sinks.js';
import { WatchLogger } from '../../capture/watch-logger.js';
import { PaneWatcher, createSignalController } from '../../capture/watcher.js';

export interface WatchCommandOptions {
  scanIntervalMs: number;
  idleThresholdMs: number;
  /** Also append report lines to this file. */
  logFile?: string;
}

/**
 * Report idle agent panes every scan interval until SIGINT/SIGTERM or until
 * `signal` aborts.
 */
export async function watchCommand(
  options: WatchCommandOptions,
  ctx: CommandContext,
  signal?: AbortSignal,
): Promise<void> {
  const sinks: LineSink[] = [new ConsoleSink(ctx.print)];
  if (options.logFile) {
    sinks.push(new FileSink(options.logFile, ctx.storage));
  }

  const logger = new WatchLogger(sinks, '[panewatch:watch] ', ctx.now);
  const watcher = new PaneWatcher({
    discovery: ctx.discovery,
    source: ctx.tmux,
    logger,
    scanIntervalMs: options.scanIntervalMs,
    idleThresholdMs: options.idleThresholdMs,
    now: ctx.now,
  });

  const stop = createSignalController(logger, signal);
  try {
    await watcher.run(stop.signal);
  } finally {
    stop.dispose();
  }
}
