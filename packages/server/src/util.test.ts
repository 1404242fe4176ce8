import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { ConfigError } from '@obsidian-vault-mcp/core';
import { formatError } from './util.ts';

describe('formatError', () => {
  it('prefixes configuration errors', () => {
    assert.equal(
      formatError(new ConfigError('Invalid port: 0'), false),
      'Configuration error: Invalid port: 0'
    );
  });

  it('stringifies non-error values', () => {
    assert.equal(formatError('disk full', false), 'disk full');
  });

  it('substitutes a placeholder for an empty message', () => {
    assert.equal(formatError(new Error('  '), false), 'An unknown error occurred.');
  });

  it('appends the stack and causes in debug mode', () => {
    const error = new Error('outer', { cause: new Error('inner') });

    assert.equal(
      formatError(error, true),
      `outer\n${error.stack}\nCaused by: inner`
    );
  });
});
