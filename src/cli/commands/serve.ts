import { Command } from '@commander-js/extra-typings';
import { runMcpServer } from '../../mcp/server.js';
import { exitWithError } from '../context.js';

// stdout belongs to the protocol; nothing else may print there
export const serveCommand = new Command('serve')
  .description('Serve the memory tools over MCP on stdio')
  .action(async () => {
    try {
      await runMcpServer();
    } catch (error) {
      exitWithError(error);
    }
  });
