import type { Block } from '../../domain/entities/Block.ts';
import type { Log, LogFilter } from '../../domain/entities/Log.ts';
import type { Trace } from '../../domain/entities/Trace.ts';

/**
 * Chain node capabilities the feeds depend on.
 * Implementations perform no retry beyond their transport's own.
 */
export interface IChainClient {
  /**
   * Chain ID
   */
  readonly chainId: number;

  /**
   * Get current head block number
   */
  getBlockNumber(): Promise<bigint>;

  /**
   * Get block by number, or null when the node does not have it
   */
  getBlock(blockNumber: bigint): Promise<Block | null>;

  /**
   * Get the call traces of a block (`trace_block`)
   */
  traceBlock(blockNumber: bigint): Promise<Trace[]>;

  /**
   * Get logs matching filter
   */
  getLogs(filter: LogFilter): Promise<Log[]>;

  /**
   * Health check
   */
  isHealthy(): Promise<boolean>;
}
