import type { JSONSchema7 } from 'json-schema';
import type { ArgumentError, RemoteFailure } from '../errors.ts';
import type { ObsidianClient } from '../obsidian/client.ts';

/**
 * Tool input schemas are always JSON object schemas.
 */
export type ToolInputSchema = JSONSchema7 & {
  type: 'object';
  properties: Record<string, JSONSchema7>;
  required?: string[];
};

/**
 * Tool information for external consumption (without the executor).
 * Compatible with the MCP `Tool` object.
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface TextContent {
  type: 'text';
  text: string;
}

/**
 * Content blocks returned by a tool. Always a single text block here.
 */
export type ToolResult = TextContent[];

export type ToolFailure = ArgumentError | RemoteFailure;

export type ToolOutcome =
  | { ok: true; content: ToolResult }
  | { ok: false; error: ToolFailure };

export interface ToolContext {
  client: ObsidianClient;
}

export interface ToolHandler {
  readonly name: string;
  describe(): ToolDescriptor;
  /**
   * Validates `args` and runs the tool. Validation happens before any
   * request reaches the client.
   */
  execute(
    args: Record<string, unknown>,
    context: ToolContext
  ): Promise<ToolOutcome>;
}
