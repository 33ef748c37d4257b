/**
 * Default IStorage implementation using Node.js fs
 */

import { readFileSync, writeFileSync, appendFileSync, existsSync, mkdirSync } from 'fs';
import type { IStorage } from '../types/interfaces.js';

export class FileStorage implements IStorage {
  readFile(path: string, encoding: BufferEncoding): string {
    return readFileSync(path, encoding);
  }

  writeFile(path: string, data: string): void {
    writeFileSync(path, data);
  }

  appendFile(path: string, data: string): void {
    appendFileSync(path, data);
  }

  exists(path: string): boolean {
    return existsSync(path);
  }

  mkdirp(path: string): void {
    mkdirSync(path, { recursive: true });
  }
}
