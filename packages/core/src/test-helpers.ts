import { MockAgent } from 'undici';
import { ObsidianClient } from './obsidian/client.ts';
import type { Logger } from './log.ts';

export const TEST_ORIGIN = 'https://127.0.0.1:27124';
export const TEST_API_KEY = 'test-key';

/**
 * A client wired to an in-process undici MockAgent. Requests without a
 * matching interceptor fail, since net connect is disabled.
 */
export function createMockClient() {
  const agent = new MockAgent();
  agent.disableNetConnect();
  const client = new ObsidianClient({
    apiKey: TEST_API_KEY,
    dispatcher: agent
  });
  return { agent, client, vault: agent.get(TEST_ORIGIN) };
}

export function createMemoryLogger(): Logger & { lines: unknown[] } {
  const lines: unknown[] = [];
  return {
    lines,
    log: (msg: unknown) => {
      lines.push(msg);
    }
  };
}
