/**
 * mnemos MCP server
 *
 * Exposes the memory and exploration-thread tools over the Model Context
 * Protocol on stdio. The process holds one memory session for its lifetime.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { findProjectRoot, initProject } from '../config/index.js';
import { createConsoleLogger, type Logger } from '../core/logger.js';
import { openRuntime, type Runtime } from '../runtime.js';
import { getToolDefinitions, MemoryToolExecutor } from './tools.js';

export const SERVER_NAME = 'mnemos';
export const SERVER_VERSION = '0.1.0';

/**
 * Build an MCP server over an open runtime. The caller connects a transport.
 */
export function createMcpServer(runtime: Runtime): Server {
  const executor = new MemoryToolExecutor(runtime.manager, runtime.tracker);

  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getToolDefinitions() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const result = await executor.execute(name, args ?? {});

    if (!result.success) {
      return {
        content: [{ type: 'text', text: result.message }],
        isError: true,
      };
    }
    return {
      content: [{ type: 'text', text: result.message }],
    };
  });

  return server;
}

async function shutdown(runtime: Runtime, logger: Logger): Promise<void> {
  try {
    await runtime.manager.endSession();
  } catch (error) {
    logger.warn('Could not store the session on shutdown', error);
  } finally {
    runtime.close();
  }
}

/**
 * Open (or create) the memory store for the current directory and serve it
 * on stdio until the process is signalled.
 */
export async function runMcpServer(cwd: string = process.cwd()): Promise<void> {
  const logger = createConsoleLogger();

  let projectRoot = findProjectRoot(cwd);
  if (!projectRoot) {
    initProject(cwd);
    projectRoot = cwd;
    logger.debug(`Initialized memory store in ${cwd}`);
  }

  const runtime = await openRuntime(projectRoot, { logger });
  const server = createMcpServer(runtime);

  await runtime.manager.startSession();

  const transport = new StdioServerTransport();
  await server.connect(transport);

  const stop = () => {
    shutdown(runtime, logger).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.warn('Shutdown failed', error);
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', stop);
  process.on('SIGTERM', stop);
}
