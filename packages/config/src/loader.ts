import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { createJiti } from 'jiti';
import { chainfeedConfigSchema } from './schema.ts';
import {
  DEFAULT_CHAIN_CONFIG,
  DEFAULT_FEED_CONFIG,
  DEFAULT_HEALTH_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  getCommonChain,
} from './defaults.ts';
import type { ChainfeedConfig, ResolvedConfig } from './types.ts';

/**
 * Configuration file names to search for (in order)
 */
const CONFIG_FILE_NAMES = [
  'chainfeed.config.ts',
  'chainfeed.config.js',
  'chainfeed.config.mts',
  'chainfeed.config.mjs',
];

/**
 * Find configuration file in the given directory
 */
function findConfigFile(cwd: string): string | undefined {
  for (const fileName of CONFIG_FILE_NAMES) {
    const filePath = join(cwd, fileName);
    if (existsSync(filePath)) {
      return filePath;
    }
  }

  return undefined;
}

/**
 * Pick the config object out of a loaded module.
 * Supports both default export and a named `config` export.
 */
function pickConfigExport(module: unknown): unknown {
  if (typeof module === 'object' && module !== null) {
    if ('default' in module && module.default !== undefined) return module.default;
    if ('config' in module) return module.config;
  }
  return module;
}

/**
 * Load configuration from a file path
 * Uses jiti to support TypeScript config files
 */
async function loadConfigFile(filePath: string): Promise<unknown> {
  const jiti = createJiti(import.meta.url, {
    interopDefault: true,
  });

  const module = await jiti.import(filePath);
  return pickConfigExport(module);
}

/**
 * Validate raw configuration, throwing with every issue listed
 */
export function parseConfig(rawConfig: unknown): ChainfeedConfig {
  const parseResult = chainfeedConfigSchema.safeParse(rawConfig);
  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${errors}`);
  }
  return parseResult.data;
}

/**
 * Fill in every optional section with defaults.
 * The polling interval falls back to the known cadence of the chain.
 */
export function resolveConfig(config: ChainfeedConfig): ResolvedConfig {
  const known = getCommonChain(config.chain.id);
  const feed = config.feed ?? {};

  return {
    chain: {
      ...DEFAULT_CHAIN_CONFIG,
      ...config.chain,
    },
    contracts: config.contracts,
    feed: {
      startBlock: feed.startBlock ?? DEFAULT_FEED_CONFIG.startBlock,
      blockOffset: feed.blockOffset ?? DEFAULT_FEED_CONFIG.blockOffset,
      maxBlockAge: feed.maxBlockAge ?? DEFAULT_FEED_CONFIG.maxBlockAge,
      pollingInterval:
        feed.pollingInterval ?? known?.pollingInterval ?? DEFAULT_FEED_CONFIG.pollingInterval,
      cacheSize: feed.cacheSize ?? DEFAULT_FEED_CONFIG.cacheSize,
    },
    logging: {
      ...DEFAULT_LOGGING_CONFIG,
      ...config.logging,
    },
    health: {
      ...DEFAULT_HEALTH_CONFIG,
      ...config.health,
    },
  };
}

/**
 * Load, validate and resolve chainfeed configuration
 */
export async function loadConfig(options?: {
  /** Custom config file path */
  configPath?: string;
  /** Working directory to search for config (default: process.cwd()) */
  cwd?: string;
}): Promise<ResolvedConfig> {
  const cwd = options?.cwd ?? process.cwd();

  const configPath = options?.configPath ?? findConfigFile(cwd);
  if (!configPath) {
    throw new Error(
      `No configuration file found. Create one of: ${CONFIG_FILE_NAMES.join(', ')}`
    );
  }

  let rawConfig: unknown;
  try {
    rawConfig = await loadConfigFile(configPath);
  } catch (error) {
    throw new Error(
      `Failed to load configuration from ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return resolveConfig(parseConfig(rawConfig));
}

/**
 * Create a type-safe configuration helper
 */
export function defineConfig<T extends ChainfeedConfig>(config: T): T {
  return config;
}
