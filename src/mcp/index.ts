/**
 * Model Context Protocol surface: the LLM-callable tools and a stdio server.
 */

export { createMcpServer, runMcpServer, SERVER_NAME, SERVER_VERSION } from './server.js';
export {
  getToolDefinitions,
  getToolPromptSection,
  MemoryToolExecutor,
  TOOL_DEFINITIONS,
  type ToolDefinition,
  type ToolResult,
} from './tools.js';
