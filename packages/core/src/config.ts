import fs from 'fs/promises';
import path from 'path';
import os from 'os';

import * as toml from '@iarna/toml';
import { log } from './log.ts';
import { ConfigError } from './errors.ts';
import type { ObsidianClientOptions, Protocol } from './obsidian/types.ts';

export const DEFAULT_DATA_DIR = '~/.obsidian-vault-mcp';

export interface Config {
  obsidian: {
    apiKey?: string;
    protocol: string;
    host: string;
    port: number;
    verifySsl: boolean;
  };
}

type RecursivePartial<T> = {
  [K in keyof T]?: T[K] extends object ? RecursivePartial<T[K]> : T[K];
};

export type Env = Record<string, string | undefined>;

/**
 * Resolves a directory path, expanding ~ to the user's home directory
 */
export function resolveDataDir(dataDir: string): string {
  if (dataDir.startsWith('~')) {
    return path.join(os.homedir(), dataDir.slice(1));
  }
  return dataDir;
}

function getMainConfigPath(dataDir: string): string {
  return path.join(dataDir, 'config.toml');
}

async function getAllConfigPaths(dataDir: string): Promise<string[]> {
  const files = await fs.readdir(dataDir);
  const configFiles = files.filter(
    file => file.startsWith('config.') && file.endsWith('.toml')
  );
  return configFiles
    .sort((a, b) =>
      a.replace('.toml', '').localeCompare(b.replace('.toml', ''))
    )
    .map(file => path.join(dataDir, file));
}

const defaultConfig: Config = {
  obsidian: {
    protocol: 'https',
    host: '127.0.0.1',
    port: 27124,
    verifySsl: false
  }
};

export class ConfigStore {
  private base: Config;
  private main: RecursivePartial<Config>;
  private env: Env;

  private constructor(
    { base, main }: { base: Config; main: RecursivePartial<Config> },
    env: Env
  ) {
    this.base = base;
    this.main = main;
    this.env = env;
  }

  static async create(
    dataDir: string,
    env: Env = process.env
  ): Promise<ConfigStore> {
    await fs.mkdir(dataDir, { recursive: true });
    const { base, main } = await loadConfig(dataDir);
    return new ConfigStore({ base, main }, env);
  }

  /**
   * The merged configuration: defaults, then extra config files, then
   * config.toml, then environment variables.
   */
  get(): Config {
    return applyEnv(merge(this.base, this.main), this.env);
  }

  /**
   * Connection settings for the remote client.
   * @throws ConfigError when no API key is set or a setting is invalid.
   */
  clientOptions(): ObsidianClientOptions {
    const { obsidian } = this.get();
    if (!obsidian.apiKey) {
      throw new ConfigError(
        'OBSIDIAN_API_KEY environment variable (or obsidian.apiKey in config.toml) required.'
      );
    }
    if (!isProtocol(obsidian.protocol)) {
      throw new ConfigError(
        `Invalid protocol: ${obsidian.protocol}. Must be one of: http, https`
      );
    }
    if (
      !Number.isInteger(obsidian.port) ||
      obsidian.port < 1 ||
      obsidian.port > 65535
    ) {
      throw new ConfigError(`Invalid port: ${obsidian.port}`);
    }
    return {
      apiKey: obsidian.apiKey,
      protocol: obsidian.protocol,
      host: obsidian.host,
      port: obsidian.port,
      verifySsl: obsidian.verifySsl
    };
  }
}

function isProtocol(value: string): value is Protocol {
  return value === 'http' || value === 'https';
}

/**
 * Loads the config from the config.toml file in the data directory
 */
async function loadConfig(
  dataDir: string
): Promise<{ base: Config; main: RecursivePartial<Config> }> {
  const mainConfigPath = getMainConfigPath(dataDir);
  // Ensure main config file exists
  try {
    await fs.access(mainConfigPath);
  } catch (_error) {
    await saveConfig(dataDir, defaultConfig);
    log(
      dataDir,
      `[ConfigStore] Created default config file at ${mainConfigPath}`
    );
  }

  const main = parseConfig(await fs.readFile(mainConfigPath, 'utf-8'));

  // Read additional configs
  const configPaths = (await getAllConfigPaths(dataDir)).filter(
    p => path.resolve(p) !== path.resolve(mainConfigPath)
  );
  let base: Config = defaultConfig;
  for (const configPath of configPaths) {
    log(dataDir, `[ConfigStore] Reading config from ${configPath}`);
    const content = await fs.readFile(configPath, 'utf-8');
    base = merge(base, parseConfig(content));
  }
  return { base, main };
}

function parseConfig(content: string): RecursivePartial<Config> {
  const parsed = toml.parse(content);
  const section = parsed.obsidian;
  if (section === undefined) {
    return {};
  }
  if (
    typeof section !== 'object' ||
    Array.isArray(section) ||
    section instanceof Date
  ) {
    throw new ConfigError('[obsidian] must be a table');
  }
  const obsidian: RecursivePartial<Config['obsidian']> = {};
  for (const [key, value] of Object.entries(section)) {
    switch (key) {
      case 'apiKey':
      case 'protocol':
      case 'host':
        if (typeof value !== 'string') {
          throw new ConfigError(`obsidian.${key} must be a string`);
        }
        obsidian[key] = value;
        break;
      case 'port':
        if (typeof value !== 'number') {
          throw new ConfigError('obsidian.port must be a number');
        }
        obsidian.port = value;
        break;
      case 'verifySsl':
        if (typeof value !== 'boolean') {
          throw new ConfigError('obsidian.verifySsl must be a boolean');
        }
        obsidian.verifySsl = value;
        break;
      default:
        // ignore unknown keys
        break;
    }
  }
  return { obsidian };
}

function merge<T extends RecursivePartial<Config>>(
  base: T,
  updates: RecursivePartial<Config>
): T {
  return {
    ...base,
    ...updates,
    obsidian: {
      ...base.obsidian,
      ...updates.obsidian
    }
  };
}

/**
 * Saves the config object back to the config.toml file.
 */
async function saveConfig(
  dataDir: string,
  config: RecursivePartial<Config>
): Promise<void> {
  const configPath = getMainConfigPath(dataDir);
  const obsidian: toml.JsonMap = {};
  for (const [key, value] of Object.entries(config.obsidian ?? {})) {
    if (value !== undefined) {
      obsidian[key] = value;
    }
  }
  const tomlString = toml.stringify({ obsidian });
  await fs.writeFile(configPath, tomlString, 'utf-8');
}

/**
 * Environment variables take precedence over every config file.
 */
function applyEnv(config: Config, env: Env): Config {
  const obsidian = { ...config.obsidian };
  if (env.OBSIDIAN_API_KEY) {
    obsidian.apiKey = env.OBSIDIAN_API_KEY;
  }
  if (env.OBSIDIAN_PROTOCOL) {
    obsidian.protocol = env.OBSIDIAN_PROTOCOL;
  }
  if (env.OBSIDIAN_HOST) {
    obsidian.host = env.OBSIDIAN_HOST;
  }
  if (env.OBSIDIAN_PORT) {
    obsidian.port = Number(env.OBSIDIAN_PORT);
  }
  if (env.OBSIDIAN_VERIFY_SSL) {
    obsidian.verifySsl = ['1', 'true'].includes(
      env.OBSIDIAN_VERIFY_SSL.toLowerCase()
    );
  }
  return { ...config, obsidian };
}
