import { Command, Option } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { DURABLE_TIERS } from '../../memory/types.js';
import { exitWithError, parsePositiveInt, withRuntime } from '../context.js';
import { emptyState, formatMemory, icons } from '../ui.js';

export const recallCommand = new Command('recall')
  .description('Search memories across tiers, ranked by effective importance')
  .argument('<query...>', 'What to search for')
  .option('-n, --limit <n>', 'Maximum results', parsePositiveInt, 5)
  .addOption(new Option('-t, --tier <tiers...>', 'Only search these tiers').choices(DURABLE_TIERS))
  .option('--ids', 'Show memory ids')
  .action(async (words, options) => {
    const query = words.join(' ');

    try {
      const results = await withRuntime(({ manager }) =>
        manager.recall(query, { limit: options.limit, tiers: options.tier, includeWorking: false })
      );

      if (results.length === 0) {
        emptyState(`No memories found for "${query}"`, 'Store some with `mnemos remember`.');
        return;
      }

      console.log(chalk.bold(`\n${icons.search} ${results.length} memories for "${query}":\n`));
      for (const entry of results) {
        console.log(formatMemory(entry, { showId: options.ids }));
        console.log();
      }
    } catch (error) {
      exitWithError(error);
    }
  });
