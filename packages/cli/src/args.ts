import { InvalidArgumentError } from 'commander';

/**
 * Block height argument
 */
export function parseBlockNumber(value: string): bigint {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer block number.');
  }
  return BigInt(value);
}

/**
 * Number of recent blocks, at least one
 */
export function parseBlockCount(value: string): bigint {
  const count = parseBlockNumber(value);
  if (count === 0n) {
    throw new InvalidArgumentError('Expected at least one block.');
  }
  return count;
}

/**
 * Blocks per second for backfills
 */
export function parseRate(value: string): number {
  const rate = Number(value);
  if (!Number.isFinite(rate) || rate <= 0) {
    throw new InvalidArgumentError('Expected a positive number of blocks per second.');
  }
  return rate;
}

/**
 * Counts repeated -v flags
 */
export function increaseVerbosity(_value: string, previous: number): number {
  return previous + 1;
}
