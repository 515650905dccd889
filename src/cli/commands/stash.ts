// Stash command - create, list, apply, pop or drop stashes

import { Command } from 'commander';
import { createContext } from '../utils/context.js';
import { fail, success, withErrorHandling } from '../utils/error-handler.js';
import { formatStashes } from '../utils/format.js';
import { DEFAULT_STASH_MESSAGE } from '../../services/timeline/timeline-service.js';
import { ValidationError } from '../../core/errors.js';

interface StashOptions {
  list?: boolean;
  apply?: boolean;
  pop?: boolean;
  drop?: boolean;
}

export function registerStashCommand(program: Command): void {
  program
    .command('stash')
    .description('Stash the current state, or manage existing stashes')
    .argument('[value]', 'Stash message, or a stash ID with --apply/--pop/--drop (default: most recent)')
    .option('--list', 'List stashes')
    .option('--apply', 'Apply a stash and keep it')
    .option('--pop', 'Apply a stash and remove it')
    .option('--drop', 'Remove a stash without applying it')
    .action(withErrorHandling(async (value: string | undefined, options: StashOptions, command: Command) => {
      const actions = [options.list, options.apply, options.pop, options.drop].filter(Boolean);
      if (actions.length > 1) {
        throw new ValidationError('Use only one of --list, --apply, --pop, --drop', 'action');
      }

      const { timeline } = await createContext(command);
      const target = value ? `'${value}'` : 'the most recent stash';

      if (options.list) {
        console.log(formatStashes(await timeline.listStashes()));
      } else if (options.apply || options.pop) {
        const pop = options.pop === true;
        if (await timeline.applyStash(value, pop)) {
          success(`${pop ? 'Popped' : 'Applied'} ${target}`);
        } else {
          fail(`Failed to apply ${target} (no such stash)`);
        }
      } else if (options.drop) {
        if (await timeline.dropStash(value)) {
          success(`Dropped ${target}`);
        } else {
          fail(`Failed to drop ${target} (no such stash)`);
        }
      } else {
        const message = value ?? DEFAULT_STASH_MESSAGE;
        const id = await timeline.createStash(message);
        success(`Created stash '${id}': ${message}`);
      }
    }));
}
