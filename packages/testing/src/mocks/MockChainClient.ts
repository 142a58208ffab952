import type { Block, IChainClient, Log, LogFilter, Trace } from '@chainfeed/core';

/**
 * Chain client methods, as recorded in `calls`
 */
export type ChainMethod = 'getBlockNumber' | 'getBlock' | 'traceBlock' | 'getLogs' | 'isHealthy';

/**
 * One recorded call with its first argument
 */
export interface ChainCall {
  method: ChainMethod;
  arg?: bigint | LogFilter;
}

/**
 * In-memory chain client for testing.
 * Head heights are served from a queue; the last one repeats once it drains.
 */
export class MockChainClient implements IChainClient {
  readonly chainId: number;
  readonly calls: ChainCall[] = [];

  private heads: bigint[] = [1000n];
  private blocks: Map<bigint, Block> = new Map();
  private traces: Map<bigint, Trace[]> = new Map();
  private logs: Log[] = [];
  private failures: Map<ChainMethod, Error> = new Map();
  private healthy = true;

  constructor(chainId: number = 31337) {
    this.chainId = chainId;
  }

  /**
   * Set a constant head block number
   */
  setBlockNumber(blockNumber: bigint): void {
    this.heads = [blockNumber];
  }

  /**
   * Serve these head heights on successive polls, repeating the last
   */
  queueBlockNumbers(...blockNumbers: bigint[]): void {
    if (blockNumbers.length === 0) {
      throw new Error('At least one block number is required');
    }
    this.heads = [...blockNumbers];
  }

  /**
   * Add or replace blocks
   */
  addBlocks(blocks: readonly Block[]): void {
    for (const block of blocks) {
      this.blocks.set(block.number, block);
    }
  }

  /**
   * Set the traces returned for a block
   */
  setTraces(blockNumber: bigint, traces: Trace[]): void {
    this.traces.set(blockNumber, traces);
  }

  /**
   * Add mock logs
   */
  addLogs(logs: readonly Log[]): void {
    this.logs.push(...logs);
  }

  /**
   * Make every call to `method` reject with `error`
   */
  failOn(method: ChainMethod, error: Error): void {
    this.failures.set(method, error);
  }

  setHealthy(healthy: boolean): void {
    this.healthy = healthy;
  }

  /**
   * Arguments of the recorded calls to one method
   */
  callsTo(method: ChainMethod): Array<bigint | LogFilter | undefined> {
    return this.calls.filter((call) => call.method === method).map((call) => call.arg);
  }

  async getBlockNumber(): Promise<bigint> {
    this.record('getBlockNumber');
    const head = this.heads.length > 1 ? this.heads.shift() : this.heads[0];
    if (head === undefined) {
      throw new Error('No head block number configured');
    }
    return head;
  }

  async getBlock(blockNumber: bigint): Promise<Block | null> {
    this.record('getBlock', blockNumber);
    return this.blocks.get(blockNumber) ?? null;
  }

  async traceBlock(blockNumber: bigint): Promise<Trace[]> {
    this.record('traceBlock', blockNumber);
    return this.traces.get(blockNumber) ?? [];
  }

  async getLogs(filter: LogFilter): Promise<Log[]> {
    this.record('getLogs', filter);
    const addresses = (typeof filter.address === 'string' ? [filter.address] : filter.address).map((a) =>
      a.toLowerCase()
    );
    return this.logs.filter(
      (log) =>
        log.blockNumber >= filter.fromBlock &&
        log.blockNumber <= filter.toBlock &&
        addresses.includes(log.address.toLowerCase())
    );
  }

  async isHealthy(): Promise<boolean> {
    this.calls.push({ method: 'isHealthy' });
    return this.healthy;
  }

  private record(method: ChainMethod, arg?: bigint | LogFilter): void {
    this.calls.push({ method, arg });
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }
}
