import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import { strict as assert } from 'node:assert';
import type { MockAgent } from 'undici';
import { createMockClient } from '../test-helpers.ts';
import type { ObsidianClient } from '../obsidian/client.ts';
import { ArgumentError, RemoteFailure } from '../errors.ts';
import type { ToolHandler, ToolOutcome } from './types.ts';
import {
  appendContent,
  batchGetFileContents,
  getFileContents,
  listFilesInDir,
  listFilesInVault,
  patchContent
} from './vault.ts';
import {
  complexSearch,
  formatSearchResults,
  recentChanges,
  simpleSearch
} from './search.ts';
import { periodicNote, recentPeriodicNotes } from './periodic.ts';

function textOf(outcome: ToolOutcome): string {
  assert.equal(outcome.ok, true);
  return outcome.ok ? outcome.content.map(c => c.text).join('') : '';
}

function errorOf(outcome: ToolOutcome): Error {
  assert.equal(outcome.ok, false);
  return outcome.ok ? new Error('expected a failure') : outcome.error;
}

describe('tool handlers', () => {
  let agent: MockAgent;
  let client: ObsidianClient;
  let run: (
    handler: ToolHandler,
    args: Record<string, unknown>
  ) => Promise<ToolOutcome>;

  beforeEach(() => {
    ({ agent, client } = createMockClient());
    run = (handler, args) => handler.execute(args, { client });
  });

  afterEach(async () => {
    mock.restoreAll();
    await agent.close();
  });

  describe('argument validation', () => {
    it('reports a missing required field without calling the service', async () => {
      const read = mock.method(client, 'getFileContents');

      const error = errorOf(await run(getFileContents, {}));

      assert.ok(error instanceof ArgumentError);
      assert.equal(error.message, 'filepath argument missing in arguments');
      assert.equal(read.mock.callCount(), 0);
    });

    it('reports the first missing field of a patch', async () => {
      const error = errorOf(await run(patchContent, {}));

      assert.equal(error.message, 'filepath argument missing in arguments');
    });

    it('lists every period when the period is unknown', async () => {
      const fetchNote = mock.method(client, 'getPeriodicNote');

      const error = errorOf(await run(periodicNote, { period: 'hourly' }));

      assert.equal(
        error.message,
        'Invalid period: hourly. Must be one of: daily, weekly, monthly, quarterly, yearly'
      );
      assert.equal(fetchNote.mock.callCount(), 0);
    });

    it('reports a missing period', async () => {
      const error = errorOf(await run(recentPeriodicNotes, {}));

      assert.equal(error.message, 'period argument missing in arguments');
    });

    it('rejects an unknown patch operation', async () => {
      const error = errorOf(
        await run(patchContent, {
          filepath: 'plan.md',
          operation: 'delete',
          target_type: 'heading',
          target: 'Goals',
          content: 'x'
        })
      );

      assert.equal(
        error.message,
        'Invalid operation: delete. Must be one of: append, prepend, replace'
      );
    });

    it('rejects a limit above the maximum', async () => {
      const error = errorOf(
        await run(recentPeriodicNotes, { period: 'daily', limit: 51 })
      );

      assert.equal(error.message, 'Invalid limit: 51. Must be at most 50');
    });

    it('rejects a limit below one', async () => {
      const error = errorOf(await run(recentChanges, { limit: 0 }));

      assert.equal(error.message, 'Invalid limit: 0. Must be a positive integer');
    });

    it('rejects a fractional days value', async () => {
      const error = errorOf(await run(recentChanges, { days: 1.5 }));

      assert.equal(error.message, 'Invalid days: 1.5. Must be a positive integer');
    });

    it('does not coerce a string include_content', async () => {
      const error = errorOf(
        await run(recentPeriodicNotes, {
          period: 'daily',
          include_content: 'yes'
        })
      );

      assert.equal(
        error.message,
        'Invalid include_content: yes. Must be a boolean'
      );
    });

    it('requires the complex search query to be an object', async () => {
      const error = errorOf(await run(complexSearch, { query: 'tag:#work' }));

      assert.equal(error.message, 'Invalid query: expected an object');
    });
  });

  describe('vault tools', () => {
    it('renders a listing as indented JSON', async () => {
      mock.method(client, 'listFilesInVault', async () => ({
        ok: true,
        value: ['Inbox.md', 'projects/']
      }));

      const text = textOf(await run(listFilesInVault, {}));

      assert.equal(text, '[\n  "Inbox.md",\n  "projects/"\n]');
    });

    it('passes the directory through to the client', async () => {
      const list = mock.method(client, 'listFilesInDir', async () => ({
        ok: true,
        value: []
      }));

      const text = textOf(await run(listFilesInDir, { dirpath: 'projects' }));

      assert.equal(text, '[]');
      assert.deepEqual(list.mock.calls[0]?.arguments, ['projects']);
    });

    it('JSON-encodes file contents', async () => {
      mock.method(client, 'getFileContents', async () => ({
        ok: true,
        value: 'hello'
      }));

      const text = textOf(await run(getFileContents, { filepath: 'a.md' }));

      assert.equal(text, '"hello"');
    });

    it('returns the batch text as is', async () => {
      mock.method(
        client,
        'getBatchFileContents',
        async () => '# a.md\n\nalpha\n\n---\n\n'
      );

      const text = textOf(
        await run(batchGetFileContents, { filepaths: ['a.md'] })
      );

      assert.equal(text, '# a.md\n\nalpha\n\n---\n\n');
    });

    it('confirms an append', async () => {
      mock.method(client, 'appendContent', async () => ({
        ok: true,
        value: undefined
      }));

      const text = textOf(
        await run(appendContent, { filepath: 'log.md', content: '- entry' })
      );

      assert.equal(text, 'Successfully appended content to log.md');
    });

    it('confirms a patch', async () => {
      const patch = mock.method(client, 'patchContent', async () => ({
        ok: true,
        value: undefined
      }));

      const text = textOf(
        await run(patchContent, {
          filepath: 'plan.md',
          operation: 'prepend',
          target_type: 'frontmatter',
          target: 'status',
          content: 'draft'
        })
      );

      assert.equal(text, 'Successfully patched content in plan.md');
      assert.deepEqual(patch.mock.calls[0]?.arguments, [
        'plan.md',
        'prepend',
        'frontmatter',
        'status',
        'draft'
      ]);
    });

    it('passes a remote failure through unchanged', async () => {
      const failure = new RemoteFailure(40400, 'File does not exist');
      mock.method(client, 'getFileContents', async () => ({
        ok: false,
        error: failure
      }));

      const error = errorOf(await run(getFileContents, { filepath: 'x.md' }));

      assert.equal(error, failure);
    });
  });

  describe('search tools', () => {
    it('applies the default context length', async () => {
      const search = mock.method(client, 'search', async () => ({
        ok: true,
        value: []
      }));

      await run(simpleSearch, { query: 'standup' });

      assert.deepEqual(search.mock.calls[0]?.arguments, ['standup', 100]);
    });

    it('applies the recent-changes defaults', async () => {
      const recent = mock.method(client, 'getRecentChanges', async () => ({
        ok: true,
        value: []
      }));

      await run(recentChanges, {});

      assert.deepEqual(recent.mock.calls[0]?.arguments, [10, 90]);
    });

    it('applies the recent periodic notes defaults', async () => {
      const recent = mock.method(
        client,
        'getRecentPeriodicNotes',
        async () => ({ ok: true, value: [] })
      );

      await run(recentPeriodicNotes, { period: 'monthly' });

      assert.deepEqual(recent.mock.calls[0]?.arguments, ['monthly', 5, false]);
    });

    it('returns a periodic note as plain text', async () => {
      mock.method(client, 'getPeriodicNote', async () => ({
        ok: true,
        value: '# Week 42'
      }));

      const text = textOf(await run(periodicNote, { period: 'weekly' }));

      assert.equal(text, '# Week 42');
    });
  });
});

describe('formatSearchResults', () => {
  it('renames match offsets and fills missing fields', () => {
    const formatted = formatSearchResults([
      {
        filename: 'a.md',
        score: 1.5,
        matches: [{ context: 'hello there', match: { start: 0, end: 5 } }]
      },
      {}
    ]);

    assert.deepEqual(formatted, [
      {
        filename: 'a.md',
        score: 1.5,
        matches: [
          { context: 'hello there', match_position: { start: 0, end: 5 } }
        ]
      },
      { filename: '', score: 0, matches: [] }
    ]);
  });
});
