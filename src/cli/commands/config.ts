import { Command } from '@commander-js/extra-typings';
import chalk from 'chalk';
import {
  loadConfig,
  setConfigValue,
  getConfigValue,
} from '../../config/index.js';
import { exitWithError, requireProjectRoot } from '../context.js';

export const configCommand = new Command('config')
  .description('Read and change the memory store configuration');

// mnemos config get [key]
configCommand
  .command('get')
  .argument('[key]', 'Config key (e.g., memory.consolidationInterval)')
  .description('Get configuration value(s)')
  .action((key) => {
    try {
      const root = requireProjectRoot();
      if (key) {
        const value = getConfigValue(key, root);
        if (value === undefined) {
          console.error(chalk.red(`Unknown config key: ${key}`));
          process.exit(1);
        }
        console.log(formatValue(value));
      } else {
        console.log(JSON.stringify(loadConfig(root), null, 2));
      }
    } catch (error) {
      exitWithError(error);
    }
  });

// mnemos config set <key> <value>
configCommand
  .command('set')
  .argument('<key>', 'Config key (e.g., exploration.missingThreadPolicy)')
  .argument('<value>', 'New value')
  .description('Set a configuration value')
  .action((key, value) => {
    try {
      setConfigValue(key, value, requireProjectRoot());
      console.log(chalk.green(`✓ Set ${key} = ${value}`));
    } catch (error) {
      exitWithError(error);
    }
  });

function formatValue(value: unknown): string {
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}
