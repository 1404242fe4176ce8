import {
  ConfigStore,
  DEFAULT_DATA_DIR,
  ObsidianClient,
  ToolDispatcher,
  createDefaultRegistry,
  createFileLogger,
  initializeLog,
  logPath,
  resolveDataDir,
  type Env
} from '@obsidian-vault-mcp/core';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import yargs from 'yargs/yargs';
import chalk from 'chalk';
import { createMcpServer } from './server.ts';
import { formatError } from './util.ts';

export interface CliIo {
  stderr: (text: string) => void;
  transport: () => Transport;
  env?: Env;
}

function parseArgs(args: string[]) {
  return yargs(args)
    .option('data-dir', {
      type: 'string',
      description: 'Directory holding config.toml and the server log',
      default: DEFAULT_DATA_DIR
    })
    .option('debug', {
      type: 'boolean',
      description: 'Mirror log lines to stderr',
      default: false
    })
    .strict()
    .fail(false)
    .help()
    .alias('h', 'help')
    .parseAsync();
}

/**
 * Parses flags, wires config, log, client and dispatcher, and connects the
 * MCP server. Resolves to the process exit code; a startup failure is
 * printed to stderr and yields 1.
 */
export async function runCli(args: string[], io: CliIo): Promise<number> {
  let debug = args.includes('--debug');
  try {
    const argv = await parseArgs(args);
    debug = argv.debug;

    const dataDir = resolveDataDir(argv['data-dir']);
    // reset before the store may log that it wrote a default config
    initializeLog(dataDir);
    const configStore = await ConfigStore.create(dataDir, io.env);
    const logger = createFileLogger(dataDir, { echo: debug });

    const client = new ObsidianClient(configStore.clientOptions());
    const dispatcher = new ToolDispatcher({
      registry: createDefaultRegistry(),
      client,
      logger
    });

    const server = createMcpServer(dispatcher, logger);
    await server.connect(io.transport());
    logger.log(
      `[mcp] Serving ${dispatcher.listTools().length} tools for ${client.baseUrl}`
    );
    io.stderr(
      chalk.dim(`obsidian-vault-mcp ready, logging to ${logPath(dataDir)}`) +
        '\n'
    );
    return 0;
  } catch (error) {
    io.stderr(chalk.red(formatError(error, debug)) + '\n');
    return 1;
  }
}
