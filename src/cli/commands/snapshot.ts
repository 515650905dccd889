// Snapshot command

import { Command } from 'commander';
import { createContext } from '../utils/context.js';
import { success, withErrorHandling } from '../utils/error-handler.js';

export function registerSnapshotCommand(program: Command): void {
  program
    .command('snapshot')
    .description('Create a snapshot on the current branch')
    .argument('<message>', 'Description of the snapshot')
    .action(withErrorHandling(async (message: string, _options: unknown, command: Command) => {
      const { timeline } = await createContext(command);

      const id = await timeline.createSnapshot(message);
      success(`Created snapshot '${id}': ${message}`);
    }));
}
