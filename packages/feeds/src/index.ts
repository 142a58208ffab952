export { BlockFeed } from './BlockFeed.ts';
export type { BlockFeedOptions } from './BlockFeed.ts';
export { LogFeed } from './LogFeed.ts';
export type { LogFeedOptions } from './LogFeed.ts';
export type { BlockHandler, LogHandler, AfterBlockHandler, IBlockFeed } from './types.ts';
export { RecentBlockCache } from './RecentBlockCache.ts';
export { RateLimiter } from './RateLimiter.ts';
export { systemClock } from './clock.ts';
export type { Clock } from './clock.ts';
export {
  FeedCancelledError,
  FeedRangeCompleteError,
  ReorgDetectedError,
  BlockNotFoundError,
  isExpectedTermination,
  toError,
} from './errors.ts';
