import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import { exitWithError, withRuntime } from '../context.js';
import { header, icons, keyValue } from '../ui.js';

export const statsCommand = new Command('stats')
  .description('Show memory and exploration statistics')
  .action(async () => {
    try {
      const { memory, threads } = await withRuntime(async ({ manager, tracker }) => ({
        memory: await manager.getStats(),
        threads: tracker.getStats(),
      }));

      console.log(header('Memory', icons.brain));
      console.log(keyValue('Episodic', String(memory.episodic)));
      console.log(keyValue('Semantic', String(memory.semantic)));
      console.log(keyValue('Long-term', String(memory.longterm)));

      console.log(header('Exploration threads', icons.thread));
      console.log(keyValue('Total', String(threads.totalThreads)));
      console.log(keyValue('Active', chalk.green(String(threads.activeThreads))));
      console.log(keyValue('Dormant', chalk.yellow(String(threads.dormantThreads))));
      console.log(keyValue('Concluded', chalk.gray(String(threads.concludedThreads))));
      console.log(keyValue('Branched', String(threads.branchedThreads)));
      console.log(keyValue('Links', String(threads.totalLinks)));
      console.log(keyValue('Average depth', String(threads.averageDepth)));
      console.log();
    } catch (error) {
      exitWithError(error);
    }
  });
