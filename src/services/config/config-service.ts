/**
 * Configuration Service
 *
 * Resolves the timeline root directory and loads optional settings from
 * <root>/config.yaml. Missing or malformed settings fall back to defaults.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { LogLevel, parseLogLevel, logger } from '../../core/logger.js';
import { describeIssues } from '../../core/schemas.js';
import { CorruptionPolicy } from '../storage/file-store.js';

export const CONFIG_FILE = 'config.yaml';
export const DEFAULT_BASE_DIR = '~/.rewind';

/**
 * Storage settings
 */
export interface StorageConfig {
  onCorrupt: CorruptionPolicy;
  lockRetries: number;
}

/**
 * Restore settings
 */
export interface RestoreConfig {
  /** Take a safety snapshot before every restore */
  safe: boolean;
}

const RewindConfigSchema = z.object({
  storage: z
    .object({
      onCorrupt: z.enum(['reset', 'fail']).optional(),
      lockRetries: z.number().int().min(0).max(100).optional()
    })
    .optional(),
  restore: z
    .object({
      safe: z.boolean().optional()
    })
    .optional(),
  log: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional()
    })
    .optional()
});

/**
 * Full configuration schema
 */
export type RewindConfig = z.infer<typeof RewindConfigSchema>;

const DEFAULT_STORAGE_CONFIG: StorageConfig = {
  onCorrupt: 'reset',
  lockRetries: 10
};

const DEFAULT_RESTORE_CONFIG: RestoreConfig = {
  safe: true
};

type Env = Record<string, string | undefined>;

/**
 * Expands a leading ~ to the home directory
 */
export function expandHome(dir: string): string {
  if (dir === '~') return os.homedir();
  if (dir.startsWith('~/')) return path.join(os.homedir(), dir.slice(2));
  return dir;
}

/**
 * Root directory: explicit option, then REWIND_CONFIG_DIR, then ~/.rewind
 */
export function resolveBaseDir(dir?: string, env: Env = process.env): string {
  const chosen = dir || env.REWIND_CONFIG_DIR || DEFAULT_BASE_DIR;
  return path.resolve(expandHome(chosen));
}

/**
 * Whether confirmation prompts are skipped: --force or REWIND_FORCE=1/true/yes
 */
export function isForceEnabled(flag?: boolean, env: Env = process.env): boolean {
  if (flag) return true;
  const value = env.REWIND_FORCE?.trim().toLowerCase();
  return value === '1' || value === 'true' || value === 'yes';
}

/**
 * Configuration Service
 *
 * Provides access to configuration values from config.yaml
 * with defaults when configuration is not present.
 */
export class ConfigService {
  private configPath: string;
  private cachedConfig: RewindConfig | null = null;

  constructor(options: { baseDir: string }) {
    this.configPath = path.join(options.baseDir, CONFIG_FILE);
  }

  /**
   * Load configuration from file, with caching
   */
  private async loadConfig(): Promise<RewindConfig> {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }

    let config: RewindConfig = {};
    try {
      const content = await fs.readFile(this.configPath, 'utf-8');
      const result = RewindConfigSchema.safeParse(yaml.parse(content) ?? {});
      if (result.success) {
        config = result.data;
      } else {
        logger.warn('Ignoring invalid configuration', {
          path: this.configPath,
          reason: describeIssues(result.error)
        });
      }
    } catch (error) {
      if (error instanceof yaml.YAMLError) {
        logger.warn('Ignoring unparseable configuration', { path: this.configPath, reason: error.message });
      } else if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        logger.warn('Cannot read configuration', {
          path: this.configPath,
          reason: error instanceof Error ? error.message : String(error)
        });
      }
    }

    this.cachedConfig = config;
    return config;
  }

  async getStorageConfig(): Promise<StorageConfig> {
    const config = await this.loadConfig();
    return {
      onCorrupt: config.storage?.onCorrupt ?? DEFAULT_STORAGE_CONFIG.onCorrupt,
      lockRetries: config.storage?.lockRetries ?? DEFAULT_STORAGE_CONFIG.lockRetries
    };
  }

  async getRestoreConfig(): Promise<RestoreConfig> {
    const config = await this.loadConfig();
    return {
      safe: config.restore?.safe ?? DEFAULT_RESTORE_CONFIG.safe
    };
  }

  /**
   * Log level from REWIND_LOG_LEVEL, else config.yaml, else undefined
   */
  async getLogLevel(env: Env = process.env): Promise<LogLevel | undefined> {
    const fromEnv = parseLogLevel(env.REWIND_LOG_LEVEL);
    if (fromEnv !== undefined) {
      return fromEnv;
    }
    const config = await this.loadConfig();
    return parseLogLevel(config.log?.level);
  }
}
