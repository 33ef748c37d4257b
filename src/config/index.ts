/**
 * Configuration management
 */

import { config as loadEnv } from 'dotenv';
import { join } from 'path';
import type { PanewatchConfig } from '../types/index.js';
import type { IStorage, IEnvironment } from '../types/interfaces.js';
import { FileStorage } from '../infra/storage.js';
import { SystemEnvironment } from '../infra/environment.js';
import { DEFAULT_AGENT } from '../agents/index.js';
import { parseDuration } from './duration.js';

export const DEFAULT_IDLE_THRESHOLD_MS = 10 * 60 * 1000;
export const DEFAULT_SCAN_INTERVAL_MS = 10 * 1000;

export interface StoredConfig {
  defaultAgent?: string;
  /** Duration string, e.g. `10m` */
  idleThreshold?: string;
  /** Duration string, e.g. `10s` */
  scanInterval?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() ? value.trim() : undefined;
}

/** First candidate that parses as an accepted duration, else the fallback. */
function resolveDuration(
  candidates: Array<string | undefined>,
  fallback: number,
  accept: (ms: number) => boolean = () => true,
): number {
  for (const candidate of candidates) {
    if (candidate === undefined) continue;
    let ms: number;
    try {
      ms = parseDuration(candidate);
    } catch {
      continue;
    }
    if (accept(ms)) return ms;
  }
  return fallback;
}

export class ConfigManager {
  private storage: IStorage;
  private env: IEnvironment;
  private configDir: string;
  private configFile: string;
  private _config?: PanewatchConfig;
  private envLoaded = false;

  constructor(storage?: IStorage, env?: IEnvironment, configDir?: string) {
    this.storage = storage || new FileStorage();
    this.env = env || new SystemEnvironment();
    this.configDir = configDir || join(this.env.homedir(), '.config', 'panewatch');
    this.configFile = join(this.configDir, 'config.json');
  }

  get config(): PanewatchConfig {
    if (!this._config) {
      if (!this.envLoaded) {
        loadEnv();
        this.envLoaded = true;
      }

      const stored = this.loadStoredConfig();

      // Merge: stored config > environment variables > defaults
      this._config = {
        defaultAgent: stored.defaultAgent || this.env.get('PANEWATCH_DEFAULT_AGENT') || DEFAULT_AGENT,
        idleThresholdMs: resolveDuration(
          [stored.idleThreshold, this.env.get('PANEWATCH_IDLE_THRESHOLD')],
          DEFAULT_IDLE_THRESHOLD_MS,
        ),
        scanIntervalMs: resolveDuration(
          [stored.scanInterval, this.env.get('PANEWATCH_SCAN_INTERVAL')],
          DEFAULT_SCAN_INTERVAL_MS,
          (ms) => ms > 0,
        ),
        logDir: join(this.configDir, 'logs'),
      };
    }
    return this._config;
  }

  loadStoredConfig(): StoredConfig {
    if (!this.storage.exists(this.configFile)) {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(this.storage.readFile(this.configFile, 'utf-8'));
    } catch {
      return {};
    }
    if (!isRecord(parsed)) return {};

    const stored: StoredConfig = {};
    const defaultAgent = optionalString(parsed.defaultAgent);
    const idleThreshold = optionalString(parsed.idleThreshold);
    const scanInterval = optionalString(parsed.scanInterval);
    if (defaultAgent) stored.defaultAgent = defaultAgent;
    if (idleThreshold) stored.idleThreshold = idleThreshold;
    if (scanInterval) stored.scanInterval = scanInterval;
    return stored;
  }

  saveConfig(updates: Partial<StoredConfig>): void {
    if (!this.storage.exists(this.configDir)) {
      this.storage.mkdirp(this.configDir);
    }

    const current = this.loadStoredConfig();
    const newConfig = { ...current, ...updates };
    this.storage.writeFile(this.configFile, JSON.stringify(newConfig, null, 2));

    // Invalidate cached config
    this._config = undefined;
  }

  getConfigPath(): string {
    return this.configFile;
  }

  resetConfig(): void {
    this._config = undefined;
    this.envLoaded = false;
  }
}

/**
 * Agent for one invocation: `--claude` / `--codex` override the configured
 * default. Nothing process-wide is mutated.
 */
export function resolveActiveAgent(
  config: Pick<PanewatchConfig, 'defaultAgent'>,
  flags: { claude?: boolean; codex?: boolean },
): string {
  if (flags.codex) return 'codex';
  if (flags.claude) return 'claude';
  return config.defaultAgent;
}
