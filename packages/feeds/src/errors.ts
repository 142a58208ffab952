/**
 * Terminal value of a feed whose abort signal fired
 */
export class FeedCancelledError extends Error {
  constructor(message = 'Feed cancelled') {
    super(message);
    this.name = 'FeedCancelledError';
  }
}

/**
 * Terminal value of a bounded range that was fully processed
 */
export class FeedRangeCompleteError extends Error {
  constructor(public readonly end: bigint) {
    super(`Block range completed at ${end}`);
    this.name = 'FeedRangeCompleteError';
  }
}

/**
 * A previously observed block was replaced by a different one
 */
export class ReorgDetectedError extends Error {
  constructor(
    public readonly blockNumber: bigint,
    public readonly expectedHash: `0x${string}`,
    public readonly actualHash: `0x${string}`
  ) {
    super(`Reorg detected at block ${blockNumber}: expected ${expectedHash}, got ${actualHash}`);
    this.name = 'ReorgDetectedError';
  }
}

/**
 * The node did not return a block at an eligible height
 */
export class BlockNotFoundError extends Error {
  constructor(public readonly blockNumber: bigint) {
    super(`Block ${blockNumber} not found`);
    this.name = 'BlockNotFoundError';
  }
}

/**
 * Whether a terminal value means the feed stopped as asked rather than failed
 */
export function isExpectedTermination(error: Error): boolean {
  return error instanceof FeedCancelledError || error instanceof FeedRangeCompleteError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
