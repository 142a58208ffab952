// Chain client ports
export type { IChainClient } from './IChainClient.ts';

// Logger ports
export type { ILogger, LogContext } from './ILogger.ts';
export { LOG_LEVELS, verbosityToLogLevel } from './ILogger.ts';
