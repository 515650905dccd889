// List command - branches, snapshots or stashes

import { Command } from 'commander';
import { createContext } from '../utils/context.js';
import { withErrorHandling } from '../utils/error-handler.js';
import { formatBranches, formatSnapshots, formatStashes } from '../utils/format.js';

interface ListOptions {
  snapshots?: boolean;
  stashes?: boolean;
  branch?: string;
}

export function registerListCommand(program: Command): void {
  program
    .command('list')
    .description('List branches, or the snapshots of a branch, or stashes')
    .option('-s, --snapshots', 'List snapshots instead of branches')
    .option('--stashes', 'List stashes')
    .option('-b, --branch <branch>', 'Branch to list snapshots from (implies --snapshots)')
    .action(withErrorHandling(async (options: ListOptions, command: Command) => {
      const { timeline } = await createContext(command);

      if (options.stashes) {
        console.log(formatStashes(await timeline.listStashes()));
        return;
      }

      if (options.snapshots || options.branch) {
        const branch = options.branch ?? await timeline.currentBranch();
        console.log(formatSnapshots(await timeline.listSnapshots(branch), branch));
        return;
      }

      console.log(formatBranches(await timeline.listBranches()));
    }));
}
