import type { LineSink } from '../types/interfaces.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `YYYY/MM/DD HH:MM:SS` in local time. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}`;
}

/**
 * Prefixes and timestamps watcher messages and fans them out to every sink.
 */
export class WatchLogger {
  constructor(
    private sinks: LineSink[],
    private prefix: string = '[panewatch:watch] ',
    private now: () => Date = () => new Date(),
  ) {}

  info(message: string): void {
    this.emit(message);
  }

  warn(message: string): void {
    this.emit(`[warn] ${message}`);
  }

  idle(message: string): void {
    this.emit(`[idle] ${message}`);
  }

  private emit(message: string): void {
    const line = `${this.prefix}${formatTimestamp(this.now())} ${message}`;
    for (const sink of this.sinks) {
      sink.write(line);
    }
  }
}
