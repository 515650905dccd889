// Restore command - record a restore to an earlier snapshot

import { Command } from 'commander';
import { isForceEnabled } from '../../services/config/config-service.js';
import { PromptService } from '../../services/prompt/prompt-service.js';
import { createContext } from '../utils/context.js';
import { fail, info, success, warn, withErrorHandling } from '../utils/error-handler.js';
import { formatSnapshotInfo } from '../utils/format.js';

interface RestoreOptions {
  force?: boolean;
  unsafe?: boolean;
  info?: boolean;
}

export function registerRestoreCommand(program: Command, prompt: PromptService = new PromptService()): void {
  program
    .command('restore')
    .description('Restore to a snapshot (takes a safety snapshot first)')
    .argument('<snapshotId>', 'ID of the snapshot to restore to')
    .option('-f, --force', 'Skip the confirmation prompt')
    .option('--unsafe', 'Skip the safety snapshot')
    .option('--info', 'Show the snapshot without restoring')
    .action(withErrorHandling(async (snapshotId: string, options: RestoreOptions, command: Command) => {
      const { timeline, config } = await createContext(command);

      const snapshot = await timeline.getSnapshotInfo(snapshotId);
      if (!snapshot) {
        fail(`Snapshot '${snapshotId}' not found`);
        return;
      }

      if (options.info) {
        console.log(formatSnapshotInfo(snapshot));
        return;
      }

      if (!isForceEnabled(options.force)) {
        if (!prompt.isInteractive()) {
          warn('Not restoring without confirmation; pass --force or set REWIND_FORCE=1');
          process.exitCode = 1;
          return;
        }
        const confirmed = await prompt.promptForConfirmation(
          `Restore to ${snapshotId} (${snapshot.message}) from branch '${snapshot.branch}'?`
        );
        if (!confirmed) {
          info('Restore cancelled');
          return;
        }
      }

      const safe = options.unsafe ? false : (await config.getRestoreConfig()).safe;
      if (!await timeline.restoreSnapshot(snapshotId, safe)) {
        fail(`Failed to restore snapshot '${snapshotId}' (doesn't exist?)`);
        return;
      }

      success(`Restored to snapshot '${snapshotId}'`);
      if (!safe) {
        warn('No safety snapshot was taken');
      }
    }));
}
