import { z } from 'zod';
import { ArgumentError } from '../errors.ts';
import type { RemoteResult } from '../obsidian/types.ts';
import type {
  ToolContext,
  ToolDescriptor,
  ToolHandler,
  ToolInputSchema,
  ToolOutcome
} from './types.ts';

export interface ToolDefinition<A> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  args: z.ZodType<A, z.ZodTypeDef, unknown>;
  run: (args: A, context: ToolContext) => Promise<ToolOutcome>;
}

/**
 * Builds a handler from a descriptor, an argument schema and an executor.
 * `describe()` returns a fresh copy each time, so callers cannot alter the
 * schema other registries see.
 */
export function defineTool<A>(definition: ToolDefinition<A>): ToolHandler {
  const descriptor: ToolDescriptor = Object.freeze({
    name: definition.name,
    description: definition.description,
    inputSchema: structuredClone(definition.inputSchema)
  });

  return {
    name: definition.name,
    describe: () => structuredClone(descriptor),
    execute: async (args, context) => {
      const parsed = definition.args.safeParse(args);
      if (!parsed.success) {
        const message =
          parsed.error.issues[0]?.message ??
          `Invalid arguments for ${definition.name}`;
        return { ok: false, error: new ArgumentError(message) };
      }
      return definition.run(parsed.data, context);
    }
  };
}

export function textResult(text: string): ToolOutcome {
  return { ok: true, content: [{ type: 'text', text }] };
}

export function jsonResult(value: unknown): ToolOutcome {
  return textResult(JSON.stringify(value, null, 2));
}

/**
 * Renders a successful remote result, or passes its failure through as is.
 */
export function fromRemote<T>(
  result: RemoteResult<T>,
  render: (value: T) => ToolOutcome
): ToolOutcome {
  return result.ok ? render(result.value) : { ok: false, error: result.error };
}
