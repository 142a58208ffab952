// Types
export type {
  ChainConfig,
  ContractsConfig,
  FeedConfig,
  LoggingConfig,
  LogLevel,
  HealthConfig,
  ChainfeedConfig,
  ResolvedFeedConfig,
  ResolvedConfig,
} from './types.ts';

// Schema exports
export {
  chainfeedConfigSchema,
  addressSchema,
  chainConfigSchema,
  contractsConfigSchema,
  feedConfigSchema,
  healthConfigSchema,
  loggingConfigSchema,
  logLevelSchema,
} from './schema.ts';

// Loader exports
export { loadConfig, parseConfig, resolveConfig, defineConfig } from './loader.ts';

// Default exports
export {
  DEFAULT_CHAIN_CONFIG,
  DEFAULT_FEED_CONFIG,
  DEFAULT_LOGGING_CONFIG,
  DEFAULT_HEALTH_CONFIG,
  COMMON_CHAINS,
  getCommonChain,
} from './defaults.ts';
