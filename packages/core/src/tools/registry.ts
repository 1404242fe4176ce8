import { DuplicateToolError } from '../errors.ts';
import type { ToolDescriptor, ToolHandler } from './types.ts';

export class ToolRegistry {
  private tools = new Map<string, ToolHandler>();

  /**
   * Registers a tool handler.
   * @throws DuplicateToolError if a handler with the same name exists.
   */
  public register(handler: ToolHandler): void {
    if (this.tools.has(handler.name)) {
      throw new DuplicateToolError(handler.name);
    }
    this.tools.set(handler.name, handler);
  }

  /**
   * Retrieves a tool's handler.
   * @returns The handler, or undefined if not found.
   */
  public get(name: string): ToolHandler | undefined {
    return this.tools.get(name);
  }

  public has(name: string): boolean {
    return this.tools.has(name);
  }

  /**
   * Lists the descriptors of all registered tools, in registration order.
   */
  public *list(): Generator<ToolDescriptor> {
    for (const handler of this.tools.values()) {
      yield handler.describe();
    }
  }

  public get size(): number {
    return this.tools.size;
  }
}
