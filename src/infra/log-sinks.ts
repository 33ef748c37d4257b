/**
 * LineSink implementations for watcher reports
 */

import { dirname } from 'path';
import chalk from 'chalk';
import type { IStorage, LineSink } from '../types/interfaces.js';
import { FileStorage } from './storage.js';

function colorize(line: string): string {
  if (line.includes('[idle]')) return chalk.yellow(line);
  if (line.includes('[warn]')) return chalk.red(line);
  return line;
}

export class ConsoleSink implements LineSink {
  constructor(private print: (line: string) => void = (line) => console.log(line)) {}

  write(line: string): void {
    this.print(colorize(line));
  }
}

/** Appends each line to a file, creating its directory on first use. */
export class FileSink implements LineSink {
  private ready = false;

  constructor(
    private path: string,
    private storage: IStorage = new FileStorage(),
  ) {}

  write(line: string): void {
    if (!this.ready) {
      const dir = dirname(this.path);
      if (!this.storage.exists(dir)) {
        this.storage.mkdirp(dir);
      }
      this.ready = true;
    }
    this.storage.appendFile(this.path, line + '\n');
  }
}

/** Keeps lines in memory. */
export class MemorySink implements LineSink {
  readonly lines: string[] = [];

  write(line: string): void {
    this.lines.push(line);
  }
}
