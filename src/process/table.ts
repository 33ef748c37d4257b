/**
 * OS process table access for the pane fallback lookup
 */

import type { ICommandExecutor, IProcessTable, ProcessLookup } from '../types/interfaces.js';
import { ShellCommandExecutor } from '../infra/shell.js';
import { ProcessQueryError, errorMessage } from '../errors.js';
import { resolveTargetDescendant, type TargetPredicate } from './tree.js';

export class PsProcessTable implements IProcessTable {
  constructor(private executor: ICommandExecutor = new ShellCommandExecutor()) {}

  enumerate(): string {
    try {
      return this.executor.exec('ps -o pid,ppid,comm -e');
    } catch (error) {
      throw new ProcessQueryError(`ps: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Takes a fresh process-table snapshot per lookup. An unavailable table
 * means "no match" so the pane is left out instead of failing discovery.
 */
export class ProcessTreeLookup implements ProcessLookup {
  constructor(
    private table: IProcessTable = new PsProcessTable(),
    private isTarget?: TargetPredicate,
  ) {}

  findTargetDescendant(rootProcessId: string): string | undefined {
    let listing: string;
    try {
      listing = this.table.enumerate();
    } catch (error) {
      if (error instanceof ProcessQueryError) return undefined;
      throw error;
    }
    return resolveTargetDescendant(listing, rootProcessId, this.isTarget);
  }
}
