import { describe, it, beforeEach, afterEach } from 'node:test';
import { strict as assert } from 'node:assert';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { runCli } from './app.ts';

describe('runCli', () => {
  let dataDir: string;
  let output: string[];
  let clientTransport: InMemoryTransport;
  let serverTransport: InMemoryTransport;

  beforeEach(async () => {
    dataDir = path.join(
      await fs.mkdtemp(path.join(os.tmpdir(), 'vault-mcp-cli-')),
      'data'
    );
    output = [];
    [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  });

  afterEach(async () => {
    await clientTransport.close();
    await fs.rm(path.dirname(dataDir), { recursive: true, force: true });
  });

  function io(env: Record<string, string>) {
    return {
      stderr: (text: string) => {
        output.push(text);
      },
      transport: () => serverTransport,
      env
    };
  }

  it('starts the server and keeps the default-config line in the log', async () => {
    const code = await runCli(
      ['--data-dir', dataDir],
      io({ OBSIDIAN_API_KEY: 'test-key' })
    );

    assert.equal(code, 0);
    const lines = (await fs.readFile(path.join(dataDir, 'server.log'), 'utf-8'))
      .trimEnd()
      .split('\n');
    assert.equal(lines.length, 2);
    assert.ok(
      lines[0]?.endsWith(
        `] [ConfigStore] Created default config file at ${path.join(dataDir, 'config.toml')}`
      )
    );
    assert.ok(
      lines[1]?.endsWith('] [mcp] Serving 11 tools for https://127.0.0.1:27124')
    );

    const client = new Client({ name: 'test-client', version: '0.0.0' });
    await client.connect(clientTransport);
    const { tools } = await client.listTools();
    assert.equal(tools.length, 11);
    await client.close();
  });

  it('reports a missing API key and exits with 1', async () => {
    const code = await runCli(['--data-dir', dataDir], io({}));

    assert.equal(code, 1);
    assert.match(
      output.join(''),
      /Configuration error: OBSIDIAN_API_KEY environment variable/
    );
  });

  it('reports an unknown flag and exits with 1', async () => {
    const code = await runCli(
      ['--data-dir', dataDir, '--bogus'],
      io({ OBSIDIAN_API_KEY: 'test-key' })
    );

    assert.equal(code, 1);
    assert.match(output.join(''), /Unknown argument: bogus/);
  });
});
