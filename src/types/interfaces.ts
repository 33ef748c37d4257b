/**
 * Dependency injection interfaces
 * Enables testability by abstracting external dependencies
 */

import type { StdioOptions } from 'child_process';

export interface ExecOptions {
  encoding?: BufferEncoding;
  stdio?: StdioOptions;
  /** Milliseconds; `0` means no limit. */
  timeout?: number;
  /** Largest stdout accepted, in bytes. */
  maxBuffer?: number;
}

/**
 * Abstracts shell command execution (execSync)
 */
export interface ICommandExecutor {
  exec(command: string, options?: ExecOptions): string;
  execVoid(command: string, options?: Omit<ExecOptions, 'encoding' | 'maxBuffer'>): void;
}

/**
 * Abstracts filesystem operations
 */
export interface IStorage {
  readFile(path: string, encoding: BufferEncoding): string;
  writeFile(path: string, data: string): void;
  appendFile(path: string, data: string): void;
  exists(path: string): boolean;
  mkdirp(path: string): void;
}

/**
 * Abstracts environment variables and OS info
 */
export interface IEnvironment {
  get(key: string): string | undefined;
  homedir(): string;
  platform(): string;
}

/**
 * Raw pane listing and tail capture, as provided by the terminal multiplexer
 */
export interface IPaneSource {
  /** Tab-separated `id, command, pid, dir` rows. Throws DiscoveryError. */
  listPanesRaw(): string;
  /** Last `lineCount` lines of a pane. Throws CaptureError. */
  capturePaneTail(paneId: string, lineCount: number): string;
}

/**
 * Abstracts the OS process table (`ps` output)
 */
export interface IProcessTable {
  /** Rows of `pid ppid comm`. Throws ProcessQueryError. */
  enumerate(): string;
}

/**
 * Finds a target agent command running somewhere below a process
 */
export interface ProcessLookup {
  findTargetDescendant(rootProcessId: string): string | undefined;
}

/**
 * Accepts formatted report lines (console, log file, ...)
 */
export interface LineSink {
  write(line: string): void;
}
