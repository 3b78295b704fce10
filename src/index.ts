export * from './memory/index.js';
export * from './exploration/index.js';
export * from './core/errors.js';
export { systemClock, ManualClock, type Clock } from './core/clock.js';
export { createConsoleLogger, silentLogger, type Logger } from './core/logger.js';
export { ContextBuilder, estimateTokens, type BuiltContext, type ContextConfig, type ContextInput } from './core/context-builder.js';
export { openRuntime, type Runtime, type RuntimeOptions } from './runtime.js';
export { loadConfig, initProject, ConfigSchema, type Config } from './config/index.js';
export * from './mcp/index.js';
