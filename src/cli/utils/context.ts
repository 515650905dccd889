// Shared setup for CLI commands

import { Command } from 'commander';
import { Logger } from '../../core/logger.js';
import { ConfigService, resolveBaseDir } from '../../services/config/config-service.js';
import { TimelineService } from '../../services/timeline/timeline-service.js';

/**
 * Options every command accepts
 */
export interface GlobalOptions {
  dir?: string;
}

export interface CliContext {
  baseDir: string;
  config: ConfigService;
  timeline: TimelineService;
}

/**
 * Resolves the root directory, applies config.yaml and opens the timeline
 */
export async function createContext(command: Command): Promise<CliContext> {
  const { dir } = command.optsWithGlobals<GlobalOptions>();
  const baseDir = resolveBaseDir(dir);
  const config = new ConfigService({ baseDir });

  const level = await config.getLogLevel();
  if (level !== undefined) {
    Logger.configure({ level });
  }

  const storage = await config.getStorageConfig();
  const timeline = new TimelineService({
    baseDir,
    onCorrupt: storage.onCorrupt,
    lockRetries: storage.lockRetries
  });
  await timeline.initialize();

  return { baseDir, config, timeline };
}
