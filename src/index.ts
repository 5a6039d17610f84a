/**
 * Dice MCP server: entry point and public exports
 */

// Main server
export {
  MCPServer,
  ShutdownManager,
  createShutdownManager,
  createEngine,
  SERVER_NAME,
  SERVER_VERSION,
  type ShutdownManagerOptions,
  type MCPServerOptions,
  type CleanupHandler,
} from './server.js';
export { MessageRouter, createMessageRouter, type MessageRouterOptions } from './message-router.js';
export { createProgram, type CliDependencies } from './commands.js';

// Configuration
export { loadConfig, getConfig, reloadConfig, resetConfig, ConfigSchema, type Config } from './config.js';

// Dice engine
export * from './dice/index.js';

// Protocol
export * from './protocol/jsonrpc.js';
export * from './protocol/lifecycle.js';
export * from './protocol/capabilities.js';
export * from './protocol/errors.js';

// Transport
export * from './transport/stdio.js';

// Tools
export * from './tools/registry.js';
export * from './tools/executor.js';
export * from './tools/common.js';
export * from './tools/roll.js';
export * from './tools/roll-detailed.js';
export * from './tools/roll-batch.js';
export * from './tools/validate-syntax.js';
export * from './tools/builtin.js';

// Logging & observability
export * from './logging/handler.js';
export { StructuredLogger, type LogEntry, type LogSink, type StructuredLoggerOptions } from './observability/logger.js';
export { withSpan, TRACER_NAME } from './observability/tracing.js';
