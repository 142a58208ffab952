import type { ChainConfig, HealthConfig, LoggingConfig, ResolvedFeedConfig } from './types.ts';

// ============================================================================
// Default Chain Configuration
// ============================================================================

export const DEFAULT_CHAIN_CONFIG: Required<Pick<ChainConfig, 'timeout' | 'retryCount'>> = {
  timeout: 30_000,
  retryCount: 3,
};

// ============================================================================
// Default Feed Configuration
// ============================================================================

export const DEFAULT_FEED_CONFIG: ResolvedFeedConfig = {
  startBlock: null,
  blockOffset: 0,
  maxBlockAge: null,
  pollingInterval: 2000,
  cacheSize: 1000,
};

// ============================================================================
// Default Logging Configuration
// ============================================================================

export const DEFAULT_LOGGING_CONFIG: Required<LoggingConfig> = {
  level: 'info',
  timestamps: true,
  json: false,
};

// ============================================================================
// Default Health Configuration
// ============================================================================

export const DEFAULT_HEALTH_CONFIG: Required<HealthConfig> = {
  enabled: false,
  host: '0.0.0.0',
  port: 8090,
};

// ============================================================================
// Common Chain Configurations
// ============================================================================

/**
 * Polling cadence and a sensible confirmation depth for common networks
 */
export const COMMON_CHAINS: Record<string, { id: number; pollingInterval: number; blockOffset: number }> = {
  ethereum: {
    id: 1,
    pollingInterval: 12000,
    blockOffset: 3,
  },
  optimism: {
    id: 10,
    pollingInterval: 2000,
    blockOffset: 0,
  },
  bsc: {
    id: 56,
    pollingInterval: 3000,
    blockOffset: 15,
  },
  polygon: {
    id: 137,
    pollingInterval: 2000,
    blockOffset: 32,
  },
  fantom: {
    id: 250,
    pollingInterval: 1000,
    blockOffset: 5,
  },
  base: {
    id: 8453,
    pollingInterval: 2000,
    blockOffset: 0,
  },
  arbitrum: {
    id: 42161,
    pollingInterval: 250,
    blockOffset: 0,
  },
  avalanche: {
    id: 43114,
    pollingInterval: 2000,
    blockOffset: 0,
  },
  sepolia: {
    id: 11155111,
    pollingInterval: 12000,
    blockOffset: 3,
  },
};

/**
 * Look up the known network entry for a chain ID
 */
export function getCommonChain(chainId: number): { name: string; pollingInterval: number; blockOffset: number } | null {
  for (const [name, chain] of Object.entries(COMMON_CHAINS)) {
    if (chain.id === chainId) {
      return { name, pollingInterval: chain.pollingInterval, blockOffset: chain.blockOffset };
    }
  }
  return null;
}
