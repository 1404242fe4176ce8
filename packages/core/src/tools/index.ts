import { ToolRegistry } from './registry.ts';
import type { ToolHandler } from './types.ts';
import {
  appendContent,
  batchGetFileContents,
  getFileContents,
  listFilesInDir,
  listFilesInVault,
  patchContent
} from './vault.ts';
import { complexSearch, recentChanges, simpleSearch } from './search.ts';
import { periodicNote, recentPeriodicNotes } from './periodic.ts';

export const BUILTIN_TOOLS: readonly ToolHandler[] = [
  listFilesInDir,
  listFilesInVault,
  getFileContents,
  simpleSearch,
  patchContent,
  appendContent,
  complexSearch,
  batchGetFileContents,
  periodicNote,
  recentPeriodicNotes,
  recentChanges
];

/**
 * Creates a registry holding every built-in vault tool.
 */
export function createDefaultRegistry(): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of BUILTIN_TOOLS) {
    registry.register(tool);
  }
  return registry;
}

export { ToolRegistry };
export { defineTool, textResult, jsonResult, fromRemote } from './define.ts';
export { formatSearchResults } from './search.ts';
export type * from './types.ts';
