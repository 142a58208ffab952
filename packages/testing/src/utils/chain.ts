import type { Block, Log } from '@chainfeed/core';

/**
 * Deterministic block hash; `fork` tells apart competing blocks at one height
 */
export function hashFor(blockNumber: bigint, fork = 0): `0x${string}` {
  return `0x${fork.toString(16).padStart(2, '0')}${blockNumber.toString(16).padStart(62, '0')}`;
}

/**
 * Deterministic transaction hash
 */
export function txHashFor(blockNumber: bigint, transactionIndex: number): `0x${string}` {
  return `0x${'f'.repeat(2)}${blockNumber.toString(16).padStart(30, '0')}${transactionIndex.toString(16).padStart(32, '0')}`;
}

/**
 * Create a block whose parent is the block below it on the same fork
 */
export function createBlockFixture(
  blockNumber: bigint,
  options: { fork?: number; parentFork?: number; timestamp?: bigint; transactionCount?: number } = {}
): Block {
  const fork = options.fork ?? 0;
  return {
    number: blockNumber,
    hash: hashFor(blockNumber, fork),
    parentHash: blockNumber === 0n ? `0x${'0'.repeat(64)}` : hashFor(blockNumber - 1n, options.parentFork ?? fork),
    timestamp: options.timestamp ?? 1_700_000_000n + blockNumber * 12n,
    transactionCount: options.transactionCount ?? 0,
  };
}

/**
 * Create contiguous blocks `from..to` inclusive
 */
export function createChain(from: bigint, to: bigint, options: { fork?: number; timestamp?: (n: bigint) => bigint } = {}): Block[] {
  const blocks: Block[] = [];
  for (let n = from; n <= to; n++) {
    blocks.push(createBlockFixture(n, { fork: options.fork, timestamp: options.timestamp?.(n) }));
  }
  return blocks;
}

/**
 * Create a log emitted in a fixture block
 */
export function createLogFixture(params: {
  blockNumber: bigint;
  logIndex: number;
  address: `0x${string}`;
  transactionIndex?: number;
  topics?: readonly `0x${string}`[];
  data?: `0x${string}`;
  fork?: number;
  removed?: boolean;
}): Log {
  const transactionIndex = params.transactionIndex ?? 0;
  const topics = params.topics ?? [];
  return {
    blockNumber: params.blockNumber,
    blockHash: hashFor(params.blockNumber, params.fork ?? 0),
    transactionHash: txHashFor(params.blockNumber, transactionIndex),
    transactionIndex,
    logIndex: params.logIndex,
    address: `0x${params.address.slice(2).toLowerCase()}`,
    topic0: topics[0] ?? null,
    topic1: topics[1] ?? null,
    topic2: topics[2] ?? null,
    topic3: topics[3] ?? null,
    data: params.data ?? '0x',
    removed: params.removed ?? false,
  };
}
