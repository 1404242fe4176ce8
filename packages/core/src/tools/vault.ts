import { z } from 'zod';
import {
  PATCH_OPERATIONS,
  PATCH_TARGET_TYPES
} from '../obsidian/types.ts';
import { enumParams, requiredString, requiredStringArray } from './args.ts';
import { defineTool, fromRemote, jsonResult, textResult } from './define.ts';

export const listFilesInVault = defineTool({
  name: 'obsidian_list_files_in_vault',
  description:
    'Lists all files and directories in the root directory of your Obsidian vault.',
  inputSchema: { type: 'object', properties: {}, required: [] },
  args: z.object({}),
  run: async (_args, { client }) =>
    fromRemote(await client.listFilesInVault(), jsonResult)
});

export const listFilesInDir = defineTool({
  name: 'obsidian_list_files_in_dir',
  description:
    'Lists all files and directories that exist in a specific Obsidian directory.',
  inputSchema: {
    type: 'object',
    properties: {
      dirpath: {
        type: 'string',
        description:
          'Path to list files from (relative to your vault root). Note that empty directories will not be returned.'
      }
    },
    required: ['dirpath']
  },
  args: z.object({ dirpath: requiredString('dirpath') }),
  run: async ({ dirpath }, { client }) =>
    fromRemote(await client.listFilesInDir(dirpath), jsonResult)
});

export const getFileContents = defineTool({
  name: 'obsidian_get_file_contents',
  description: 'Return the content of a single file in your vault.',
  inputSchema: {
    type: 'object',
    properties: {
      filepath: {
        type: 'string',
        description: 'Path to the relevant file (relative to your vault root).',
        format: 'path'
      }
    },
    required: ['filepath']
  },
  args: z.object({ filepath: requiredString('filepath') }),
  run: async ({ filepath }, { client }) =>
    fromRemote(await client.getFileContents(filepath), jsonResult)
});

export const batchGetFileContents = defineTool({
  name: 'obsidian_batch_get_file_contents',
  description:
    'Return the contents of multiple files in your vault, concatenated with headers.',
  inputSchema: {
    type: 'object',
    properties: {
      filepaths: {
        type: 'array',
        items: {
          type: 'string',
          description: 'Path to a file (relative to your vault root)',
          format: 'path'
        },
        description: 'List of file paths to read'
      }
    },
    required: ['filepaths']
  },
  args: z.object({ filepaths: requiredStringArray('filepaths') }),
  // per-file failures are rendered inline, so this never fails remotely
  run: async ({ filepaths }, { client }) =>
    textResult(await client.getBatchFileContents(filepaths))
});

export const appendContent = defineTool({
  name: 'obsidian_append_content',
  description: 'Append content to a new or existing file in the vault.',
  inputSchema: {
    type: 'object',
    properties: {
      filepath: {
        type: 'string',
        description: 'Path to the file (relative to vault root)',
        format: 'path'
      },
      content: {
        type: 'string',
        description: 'Content to append to the file'
      }
    },
    required: ['filepath', 'content']
  },
  args: z.object({
    filepath: requiredString('filepath'),
    content: requiredString('content')
  }),
  run: async ({ filepath, content }, { client }) =>
    fromRemote(await client.appendContent(filepath, content), () =>
      textResult(`Successfully appended content to ${filepath}`)
    )
});

export const patchContent = defineTool({
  name: 'obsidian_patch_content',
  description:
    'Insert content into an existing note relative to a heading, block reference, or frontmatter field.',
  inputSchema: {
    type: 'object',
    properties: {
      filepath: {
        type: 'string',
        description: 'Path to the file (relative to vault root)',
        format: 'path'
      },
      operation: {
        type: 'string',
        description: 'Operation to perform (append, prepend, or replace)',
        enum: [...PATCH_OPERATIONS]
      },
      target_type: {
        type: 'string',
        description: 'Type of target to patch',
        enum: [...PATCH_TARGET_TYPES]
      },
      target: {
        type: 'string',
        description:
          'Target identifier (heading path, block reference, or frontmatter field)'
      },
      content: { type: 'string', description: 'Content to insert' }
    },
    required: ['filepath', 'operation', 'target_type', 'target', 'content']
  },
  args: z.object({
    filepath: requiredString('filepath'),
    operation: z.enum(
      PATCH_OPERATIONS,
      enumParams('operation', PATCH_OPERATIONS)
    ),
    target_type: z.enum(
      PATCH_TARGET_TYPES,
      enumParams('target_type', PATCH_TARGET_TYPES)
    ),
    target: requiredString('target'),
    content: requiredString('content')
  }),
  run: async (args, { client }) =>
    fromRemote(
      await client.patchContent(
        args.filepath,
        args.operation,
        args.target_type,
        args.target,
        args.content
      ),
      () => textResult(`Successfully patched content in ${args.filepath}`)
    )
});
