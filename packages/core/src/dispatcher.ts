import {
  ExecutionFailedError,
  InvalidInvocationError,
  UnknownToolError,
  toError
} from './errors.ts';
import type { Logger } from './log.ts';
import type { ObsidianClient } from './obsidian/client.ts';
import type { ToolRegistry } from './tools/registry.ts';
import type {
  ToolDescriptor,
  ToolOutcome,
  ToolResult
} from './tools/types.ts';

export interface ToolDispatcherOptions {
  registry: ToolRegistry;
  client: ObsidianClient;
  logger: Logger;
}

function isArgumentMap(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Entry point for the transport: advertises tools and routes calls.
 *
 * Holds no per-call state; every failure a handler reports is logged once
 * and rethrown as an {@link ExecutionFailedError}.
 */
export class ToolDispatcher {
  private readonly registry: ToolRegistry;
  private readonly client: ObsidianClient;
  private readonly logger: Logger;

  constructor({ registry, client, logger }: ToolDispatcherOptions) {
    this.registry = registry;
    this.client = client;
    this.logger = logger;
  }

  listTools(): ToolDescriptor[] {
    return Array.from(this.registry.list());
  }

  async callTool(name: string, args: unknown): Promise<ToolResult> {
    if (!isArgumentMap(args)) {
      throw new InvalidInvocationError();
    }

    const handler = this.registry.get(name);
    if (!handler) {
      throw new UnknownToolError(name);
    }

    let outcome: ToolOutcome;
    try {
      outcome = await handler.execute(args, { client: this.client });
    } catch (error) {
      return this.fail(name, toError(error));
    }
    if (!outcome.ok) {
      return this.fail(name, outcome.error);
    }
    return outcome.content;
  }

  private fail(name: string, error: Error): never {
    this.logger.log(`[dispatch] ${name} failed: ${error.message}`);
    throw new ExecutionFailedError(name, error);
  }
}
