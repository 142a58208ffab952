import type { Block, BlockEvent, Log } from '@chainfeed/core';
import type { HealthReporter } from '@chainfeed/health';

/**
 * Receives each delivered block; a throw ends the subscription
 */
export type BlockHandler = (event: BlockEvent) => Promise<void> | void;

/**
 * Receives each log of a delivered block, in chain order
 */
export type LogHandler = (log: Log, block: Block) => Promise<void> | void;

/**
 * Runs once per block after all of its logs were handled
 */
export type AfterBlockHandler = (block: Block) => Promise<void> | void;

/**
 * Contract shared by feeds.
 * The promise from `subscribe` is the subscription's terminal signal:
 * it resolves exactly once and never rejects.
 */
export interface IBlockFeed extends HealthReporter {
  subscribe(handler: BlockHandler): Promise<Error>;
  start(): void;
  isStarted(): boolean;
  startRange(start: bigint, end: bigint, rate: number): void;
}
