/**
 * Capture module - idle detection and the pane scan loop
 */

export { isIdle, idleFor, paneStatus, summarizeStatus } from './detector.js';
export { truncateLastLine } from './parser.js';
export { WatchLogger, formatTimestamp } from './watch-logger.js';
export {
  PaneWatcher,
  WATCH_CAPTURE_LINES,
  MAX_TIMER_DELAY_MS,
  createSignalController,
  waitForTick,
  type PaneSet,
  type PaneWatcherOptions,
  type SignalController,
  type TickReport,
} from './watcher.js';
