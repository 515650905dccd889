// Command tree for the rewind CLI

import { Command } from 'commander';
import { PromptService } from '../services/prompt/prompt-service.js';
import { registerListCommand } from './commands/list.js';
import { registerBranchCommand } from './commands/branch.js';
import { registerSwitchCommand } from './commands/switch.js';
import { registerRestoreCommand } from './commands/restore.js';
import { registerSnapshotCommand } from './commands/snapshot.js';
import { registerStashCommand } from './commands/stash.js';
import { registerInfoCommand } from './commands/info.js';

export const VERSION = '0.1.0';

export function createProgram(prompt: PromptService = new PromptService()): Command {
  const program = new Command();

  program
    .name('rewind')
    .description('Timeline-based state management: branches, snapshots, restores and stashes')
    .version(VERSION)
    .option('--dir <path>', 'Timeline directory (default: $REWIND_CONFIG_DIR or ~/.rewind)')
    .addHelpText('after', `
Examples:
  rewind list                          # List all branches
  rewind list --snapshots              # List snapshots in current branch
  rewind branch new-feature --switch   # Create a branch and switch to it
  rewind snapshot "Installed editor"   # Create a snapshot
  rewind restore snap_1714564800       # Restore to a snapshot
  rewind stash "WIP" && rewind stash --pop`);

  registerListCommand(program);
  registerBranchCommand(program);
  registerSwitchCommand(program);
  registerRestoreCommand(program, prompt);
  registerSnapshotCommand(program);
  registerStashCommand(program);
  registerInfoCommand(program);

  return program;
}
