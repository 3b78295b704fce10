import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import type { ConsolidationResult } from '../../memory/manager.js';
import { exitWithError, withRuntime } from '../context.js';
import { header, icons, info, list, success } from '../ui.js';

function printConsolidation(result: ConsolidationResult): void {
  console.log(success(
    `Reviewed ${result.importantEpisodes} important and ${result.positiveEpisodes} positive episodes`
  ));
  if (result.patternSummary) {
    console.log(chalk.gray(`  Pattern: ${result.patternSummary.content}`));
  }
  if (result.relationshipEssence) {
    console.log(chalk.gray(`  Relationship: ${result.relationshipEssence.content}`));
  }
  if (!result.patternSummary && !result.relationshipEssence) {
    console.log(info('Not enough significant episodes to consolidate yet.'));
  }
}

export const reflectCommand = new Command('reflect')
  .description('Review memory counts and recent mood; consolidates when episodes pile up')
  .action(async () => {
    try {
      const reflection = await withRuntime(({ manager }) => manager.reflect());

      console.log(header('Reflection', icons.brain));
      console.log(list(reflection.insights));
      if (reflection.consolidation) {
        console.log();
        printConsolidation(reflection.consolidation);
      }
      console.log();
    } catch (error) {
      exitWithError(error);
    }
  });

export const consolidateCommand = new Command('consolidate')
  .description('Distill important and positive episodes into long-term memory')
  .action(async () => {
    try {
      const result = await withRuntime(({ manager }) => manager.consolidateMemories());
      printConsolidation(result);
    } catch (error) {
      exitWithError(error);
    }
  });
