import { Command } from '@commander-js/extra-typings';
import * as path from 'path';
import { seedFromFile } from '../../memory/seed.js';
import { exitWithError, withRuntime } from '../context.js';
import { keyValue, success } from '../ui.js';

export const seedCommand = new Command('seed')
  .description('Load foundational long-term memories and facts from a JSON file')
  .argument('<file>', 'Seed file (see seeds/example.json)')
  .action(async (file) => {
    try {
      const result = await withRuntime(({ manager }) => seedFromFile(manager, path.resolve(file)));

      console.log(success(`Seeded memories from ${file}`));
      for (const [section, count] of Object.entries(result)) {
        if (count > 0) {
          console.log(`  ${keyValue(section, String(count), 14)}`);
        }
      }
    } catch (error) {
      exitWithError(error);
    }
  });
