// Switch command

import { Command } from 'commander';
import { createContext } from '../utils/context.js';
import { fail, success, withErrorHandling } from '../utils/error-handler.js';

export function registerSwitchCommand(program: Command): void {
  program
    .command('switch')
    .description('Switch to another branch')
    .argument('<name>', 'Branch to switch to')
    .action(withErrorHandling(async (name: string, _options: unknown, command: Command) => {
      const { timeline } = await createContext(command);

      if (await timeline.switchBranch(name)) {
        success(`Switched to branch '${name}'`);
      } else {
        fail(`Failed to switch to branch '${name}' (doesn't exist?)`);
      }
    }));
}
