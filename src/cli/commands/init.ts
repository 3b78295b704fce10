import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { initProject } from '../../config/index.js';
import { exitWithError } from '../context.js';
import { dim, success } from '../ui.js';

export const initCommand = new Command('init')
  .description('Create a memory store (.mnemos) in the current directory')
  .option('-f, --force', 'Overwrite existing configuration')
  .action((options) => {
    try {
      const mnemosPath = initProject(process.cwd(), options.force ?? false);
      console.log(success(`Initialized memory store in ${chalk.cyan(mnemosPath)}`));
      console.log(dim('  Seed it with `mnemos seed <file>` or start storing with `mnemos remember`.'));
    } catch (error) {
      exitWithError(error);
    }
  });
