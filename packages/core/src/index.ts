/**
 * Obsidian vault tools: a registry of tool handlers backed by the Obsidian
 * Local REST API, and the dispatcher an MCP server drives.
 *
 * @module @obsidian-vault-mcp/core
 */

export { ToolDispatcher, type ToolDispatcherOptions } from './dispatcher.ts';
export { ObsidianClient, encodeVaultPath } from './obsidian/client.ts';
export { buildRecentChangesQuery } from './obsidian/dql.ts';
export * from './obsidian/types.ts';
export * from './tools/index.ts';
export * from './errors.ts';
export * from './config.ts';
export {
  createFileLogger,
  initializeLog,
  logPath,
  formatLogLine,
  type Logger
} from './log.ts';
