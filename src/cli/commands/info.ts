// Info command - snapshot details or timeline status

import { Command } from 'commander';
import { createContext } from '../utils/context.js';
import { fail, withErrorHandling } from '../utils/error-handler.js';
import { formatSnapshotInfo, formatStatus } from '../utils/format.js';

export function registerInfoCommand(program: Command): void {
  program
    .command('info')
    .description('Show details of a snapshot, or the status of the timeline')
    .argument('[snapshotId]', 'Snapshot to describe')
    .action(withErrorHandling(async (snapshotId: string | undefined, _options: unknown, command: Command) => {
      const { timeline, baseDir } = await createContext(command);

      if (!snapshotId) {
        console.log(formatStatus(await timeline.getStatus()));
        console.log(`Timeline directory: ${baseDir}`);
        return;
      }

      const snapshot = await timeline.getSnapshotInfo(snapshotId);
      if (!snapshot) {
        fail(`Snapshot '${snapshotId}' not found`);
        return;
      }
      console.log(formatSnapshotInfo(snapshot));
    }));
}
