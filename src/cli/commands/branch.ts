// Branch command - create a branch, or list branches

import { Command } from 'commander';
import { validateBranchName } from '../../core/validation.js';
import { createContext } from '../utils/context.js';
import { fail, success, withErrorHandling } from '../utils/error-handler.js';
import { formatBranches } from '../utils/format.js';

interface BranchOptions {
  description?: string;
  from?: string;
  switch?: boolean;
}

export function registerBranchCommand(program: Command): void {
  program
    .command('branch')
    .description('Create a branch from the current (or another) branch, or list branches')
    .argument('[name]', 'Name of the branch to create')
    .option('-d, --description <description>', 'Description of the new branch')
    .option('--from <branch>', 'Branch to fork from')
    .option('--switch', 'Switch to the new branch after creating it')
    .action(withErrorHandling(async (name: string | undefined, options: BranchOptions, command: Command) => {
      const { timeline } = await createContext(command);

      if (!name) {
        console.log(formatBranches(await timeline.listBranches()));
        return;
      }

      const branchName = validateBranchName(name);
      const created = await timeline.createBranch(branchName, options.description ?? '', options.from);
      if (!created) {
        fail(`Branch '${branchName}' already exists`);
        return;
      }
      success(`Created branch '${branchName}'`);

      if (options.switch) {
        if (await timeline.switchBranch(branchName)) {
          success(`Switched to branch '${branchName}'`);
        } else {
          fail(`Failed to switch to branch '${branchName}'`);
        }
      }
    }));
}
