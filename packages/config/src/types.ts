// ============================================================================
// Chain Configuration Types
// ============================================================================

/**
 * JSON-RPC endpoint of the chain being followed
 */
export interface ChainConfig {
  /** EVM chain ID */
  id: number;
  /** HTTP JSON-RPC endpoint */
  rpcUrl: string;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  /** Transport-level retries per request (default: 3) */
  retryCount?: number;
}

// ============================================================================
// Contract Configuration Types
// ============================================================================

/**
 * Addresses of the registry contracts whose logs are mapped to messages.
 * Supplied directly; there is no on-chain name resolution.
 */
export interface ContractsConfig {
  agentRegistry: `0x${string}`;
  scannerRegistry: `0x${string}`;
  dispatch: `0x${string}`;
}

// ============================================================================
// Feed Configuration Types
// ============================================================================

/**
 * Block/log following behaviour
 */
export interface FeedConfig {
  /**
   * Height to resume from. When omitted the feed starts at the chain head
   * observed on its first poll.
   */
  startBlock?: number;
  /**
   * Confirmation depth: a block is processed only once this many blocks
   * have been mined on top of it
   * @default 0
   */
  blockOffset?: number;
  /** Blocks older than this many seconds are skipped, not delivered */
  maxBlockAge?: number;
  /** Wait between head polls when no block is eligible, in milliseconds */
  pollingInterval?: number;
  /**
   * Capacity of the recent-block cache used for reorg detection
   * @default 1000
   */
  cacheSize?: number;
}

// ============================================================================
// Logging Configuration
// ============================================================================

/**
 * Log level
 */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

/**
 * Logging configuration
 */
export interface LoggingConfig {
  level: LogLevel;
  /** Include timestamps */
  timestamps?: boolean;
  /** Output as JSON lines */
  json?: boolean;
}

// ============================================================================
// Health Configuration
// ============================================================================

/**
 * Health check server configuration
 */
export interface HealthConfig {
  enabled?: boolean;
  host?: string;
  port?: number;
}

// ============================================================================
// Main Configuration
// ============================================================================

/**
 * Configuration as written in chainfeed.config.ts
 */
export interface ChainfeedConfig {
  chain: ChainConfig;
  contracts: ContractsConfig;
  feed?: FeedConfig;
  logging?: LoggingConfig;
  health?: HealthConfig;
}

/**
 * Feed configuration after defaults are applied
 */
export interface ResolvedFeedConfig {
  startBlock: number | null;
  blockOffset: number;
  maxBlockAge: number | null;
  pollingInterval: number;
  cacheSize: number;
}

/**
 * Configuration with every optional section filled in
 */
export interface ResolvedConfig {
  chain: Required<ChainConfig>;
  contracts: ContractsConfig;
  feed: ResolvedFeedConfig;
  logging: Required<LoggingConfig>;
  health: Required<HealthConfig>;
}
