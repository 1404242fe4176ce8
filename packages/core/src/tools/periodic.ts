import { z } from 'zod';
import type { JSONSchema7 } from 'json-schema';
import { PERIODS } from '../obsidian/types.ts';
import { enumParams, positiveInteger, strictBoolean } from './args.ts';
import { defineTool, fromRemote, jsonResult, textResult } from './define.ts';

const periodProperty: JSONSchema7 = {
  type: 'string',
  description: 'The period type (daily, weekly, monthly, quarterly, yearly)',
  enum: [...PERIODS]
};

const periodArg = () => z.enum(PERIODS, enumParams('period', PERIODS));

export const periodicNote = defineTool({
  name: 'obsidian_get_periodic_note',
  description: 'Get current periodic note for the specified period.',
  inputSchema: {
    type: 'object',
    properties: { period: periodProperty },
    required: ['period']
  },
  args: z.object({ period: periodArg() }),
  run: async ({ period }, { client }) =>
    fromRemote(await client.getPeriodicNote(period), textResult)
});

export const recentPeriodicNotes = defineTool({
  name: 'obsidian_get_recent_periodic_notes',
  description: 'Get most recent periodic notes for the specified period type.',
  inputSchema: {
    type: 'object',
    properties: {
      period: periodProperty,
      limit: {
        type: 'integer',
        description: 'Maximum number of notes to return (default: 5)',
        default: 5,
        minimum: 1,
        maximum: 50
      },
      include_content: {
        type: 'boolean',
        description: 'Whether to include note content (default: false)',
        default: false
      }
    },
    required: ['period']
  },
  args: z.object({
    period: periodArg(),
    limit: positiveInteger('limit', 50).default(5),
    include_content: strictBoolean('include_content').default(false)
  }),
  run: async ({ period, limit, include_content }, { client }) =>
    fromRemote(
      await client.getRecentPeriodicNotes(period, limit, include_content),
      jsonResult
    )
});
