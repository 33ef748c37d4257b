/**
 * IEnvironment backed by process.env and os.homedir()
 */

import { homedir } from 'os';
import type { IEnvironment } from '../types/interfaces.js';

export class SystemEnvironment implements IEnvironment {
  /** Blank variables read as unset. */
  get(key: string): string | undefined {
    const value = process.env[key]?.trim();
    return value ? value : undefined;
  }

  homedir(): string {
    return homedir();
  }

  platform(): string {
    return process.platform;
  }
}
