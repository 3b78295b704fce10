import { Command } from '@commander-js/extra-typings';
import { initCommand } from './commands/init.js';
import { rememberCommand } from './commands/remember.js';
import { recallCommand } from './commands/recall.js';
import { statsCommand } from './commands/stats.js';
import { consolidateCommand, reflectCommand } from './commands/reflect.js';
import { seedCommand } from './commands/seed.js';
import { serveCommand } from './commands/serve.js';
import { configCommand } from './commands/config.js';
import { threadCommand } from './commands/thread.js';

export const program = new Command()
  .name('mnemos')
  .description('Tiered, decay-weighted memory and exploration threads for conversational agents')
  .version('0.1.0');

program.addCommand(initCommand);

// Memory
program.addCommand(rememberCommand);
program.addCommand(recallCommand);
program.addCommand(statsCommand);
program.addCommand(reflectCommand);
program.addCommand(consolidateCommand);
program.addCommand(seedCommand);

// Exploration threads
program.addCommand(threadCommand);

// mnemos serve - MCP over stdio
program.addCommand(serveCommand);

program.addCommand(configCommand);

// Default to help if no command specified
program.action(() => {
  program.help();
});
