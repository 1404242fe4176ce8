import { z } from 'zod';
import type { SimpleSearchResult } from '../obsidian/types.ts';
import { positiveInteger, requiredObject, requiredString } from './args.ts';
import { defineTool, fromRemote, jsonResult } from './define.ts';

/**
 * Flattens service search hits into the shape returned to the agent.
 */
export function formatSearchResults(results: SimpleSearchResult[]) {
  return results.map(result => ({
    filename: result.filename ?? '',
    score: result.score ?? 0,
    matches: (result.matches ?? []).map(match => ({
      context: match.context ?? '',
      match_position: {
        start: match.match?.start ?? 0,
        end: match.match?.end ?? 0
      }
    }))
  }));
}

export const simpleSearch = defineTool({
  name: 'obsidian_simple_search',
  description:
    'Simple search for documents matching a specified text query across all files in the vault. Use this tool when you want to do a simple text search',
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'string',
        description: 'Text to a simple search for in the vault.'
      },
      context_length: {
        type: 'integer',
        description:
          'How much context to return around the matching string (default: 100)',
        default: 100,
        minimum: 1
      }
    },
    required: ['query']
  },
  args: z.object({
    query: requiredString('query'),
    context_length: positiveInteger('context_length').default(100)
  }),
  run: async ({ query, context_length }, { client }) =>
    fromRemote(await client.search(query, context_length), results =>
      jsonResult(formatSearchResults(results))
    )
});

export const complexSearch = defineTool({
  name: 'obsidian_complex_search',
  description:
    "Complex search for documents using a JsonLogic query. Supports standard JsonLogic operators plus 'glob' and 'regexp' for pattern matching. Results must be non-falsy. Use this tool when you want to do a complex search, e.g. for all documents with certain tags etc.",
  inputSchema: {
    type: 'object',
    properties: {
      query: {
        type: 'object',
        description:
          'JsonLogic query object. Example: {"glob": ["*.md", {"var": "path"}]} matches all markdown files'
      }
    },
    required: ['query']
  },
  args: z.object({ query: requiredObject('query') }),
  run: async ({ query }, { client }) =>
    fromRemote(await client.searchJson(query), jsonResult)
});

export const recentChanges = defineTool({
  name: 'obsidian_get_recent_changes',
  description: 'Get recently modified files in the vault.',
  inputSchema: {
    type: 'object',
    properties: {
      limit: {
        type: 'integer',
        description: 'Maximum number of files to return (default: 10)',
        default: 10,
        minimum: 1,
        maximum: 100
      },
      days: {
        type: 'integer',
        description:
          'Only include files modified within this many days (default: 90)',
        minimum: 1,
        default: 90
      }
    }
  },
  args: z.object({
    limit: positiveInteger('limit', 100).default(10),
    days: positiveInteger('days').default(90)
  }),
  run: async ({ limit, days }, { client }) =>
    fromRemote(await client.getRecentChanges(limit, days), jsonResult)
});
