import type { Trace } from './Trace.ts';

/**
 * Block entity representing an EVM block header
 */
export interface Block {
  /** Block number */
  readonly number: bigint;
  /** Block hash */
  readonly hash: `0x${string}`;
  /** Parent block hash */
  readonly parentHash: `0x${string}`;
  /** Block timestamp (Unix seconds) */
  readonly timestamp: bigint;
  /** Transaction count */
  readonly transactionCount: number;
}

/**
 * Unit of delivery from a block feed
 */
export interface BlockEvent {
  readonly type: 'block';
  readonly block: Block;
  /** Call traces of the block, or null when tracing is disabled */
  readonly traces: readonly Trace[] | null;
}

/**
 * Create a Block from raw RPC data
 */
export function createBlock(data: {
  number: bigint;
  hash: `0x${string}`;
  parentHash: `0x${string}`;
  timestamp: bigint;
  transactions: readonly unknown[];
}): Block {
  return {
    number: data.number,
    hash: data.hash,
    parentHash: data.parentHash,
    timestamp: data.timestamp,
    transactionCount: data.transactions.length,
  };
}

/**
 * Create a block event
 */
export function createBlockEvent(block: Block, traces: readonly Trace[] | null = null): BlockEvent {
  return { type: 'block', block, traces };
}

/**
 * Block range for fetching
 */
export interface BlockRange {
  readonly from: bigint;
  readonly to: bigint;
}

/**
 * Create a block range
 */
export function createBlockRange(from: bigint, to: bigint): BlockRange {
  if (from > to) {
    throw new Error(`Invalid block range: from (${from}) > to (${to})`);
  }
  return { from, to };
}

/**
 * Calculate the size of a block range
 */
export function blockRangeSize(range: BlockRange): bigint {
  return range.to - range.from + 1n;
}
