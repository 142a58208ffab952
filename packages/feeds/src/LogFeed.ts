import {
  blockRangeSize,
  compareLogs,
  createBlockRange,
  getLogOrderKey,
  type Block,
  type IChainClient,
  type ILogger,
  type Log,
} from '@chainfeed/core';
import type { HealthReport, HealthReporter } from '@chainfeed/health';
import { BlockFeed, type BlockFeedOptions } from './BlockFeed.ts';
import { ReorgDetectedError } from './errors.ts';
import type { AfterBlockHandler, LogHandler } from './types.ts';

/**
 * Log feed options
 */
export interface LogFeedOptions extends Omit<BlockFeedOptions, 'tracing' | 'traceClient'> {
  /** Contract addresses whose logs are followed */
  addresses: readonly `0x${string}`[];
  /** Optional topic filter passed to the node */
  topics?: (`0x${string}` | `0x${string}`[] | null)[];
}

/**
 * Chain order, without removed logs or repeats
 */
function orderLogs(logs: readonly Log[]): Log[] {
  const seen = new Set<string>();
  const ordered: Log[] = [];
  for (const log of [...logs].sort(compareLogs)) {
    if (log.removed) continue;
    const key = getLogOrderKey(log);
    if (seen.has(key)) continue;
    seen.add(key);
    ordered.push(log);
  }
  return ordered;
}

/**
 * Logs of a set of contracts, driven block by block by an inner BlockFeed
 */
export class LogFeed implements HealthReporter {
  private readonly client: IChainClient;
  private readonly logger: ILogger;
  private readonly addresses: `0x${string}`[];
  private readonly topics: (`0x${string}` | `0x${string}`[] | null)[] | undefined;
  private readonly feedName: string;
  private readonly blocks: BlockFeed;

  constructor(options: LogFeedOptions) {
    this.client = options.client;
    this.feedName = options.name ?? 'log-feed';
    this.logger = options.logger.child({ module: 'LogFeed', feed: this.feedName });
    this.addresses = options.addresses.map((address) => `0x${address.slice(2).toLowerCase()}` as const);
    this.topics = options.topics;
    this.blocks = new BlockFeed({
      ...options,
      tracing: false,
      name: `${this.feedName}.blocks`,
    });
  }

  /**
   * Logs of the last `blocks` blocks up to the current head, no confirmation offset
   */
  async getLogsForLastBlocks(blocks: bigint): Promise<Log[]> {
    const latest = await this.client.getBlockNumber();
    const range = createBlockRange(latest > blocks ? latest - blocks : 0n, latest);

    const logs = await this.client.getLogs({
      address: this.addresses,
      topics: this.topics,
      fromBlock: range.from,
      toBlock: range.to,
    });

    const ordered = orderLogs(logs);
    this.logger.debug('Fetched logs for last blocks', {
      from: range.from,
      to: range.to,
      blocks: blockRangeSize(range),
      logs: ordered.length,
    });
    return ordered;
  }

  /**
   * Follow the chain, calling `handleLog` for every log of a block and then
   * `handleAfterBlock` once for that block
   */
  async forEachLog(handleLog: LogHandler, handleAfterBlock: AfterBlockHandler): Promise<Error> {
    const [terminal] = await Promise.all([
      this.blocks.subscribe(async ({ block }) => {
        const logs = await this.getBlockLogs(block);
        for (const log of logs) {
          await handleLog(log, block);
        }
        await handleAfterBlock(block);
      }),
      this.blocks.forEachBlock(),
    ]);
    return terminal;
  }

  /**
   * Same as `forEachLog` over `start..end` inclusive, at no more than `rate`
   * block-fetch attempts per second
   */
  async forEachLogInRange(
    start: bigint,
    end: bigint,
    rate: number,
    handleLog: LogHandler,
    handleAfterBlock: AfterBlockHandler
  ): Promise<Error> {
    this.blocks.configureRange(start, end, rate);
    return this.forEachLog(handleLog, handleAfterBlock);
  }

  name(): string {
    return this.feedName;
  }

  health(): HealthReport[] {
    return this.blocks.health();
  }

  private async getBlockLogs(block: Block): Promise<Log[]> {
    const logs = orderLogs(
      await this.client.getLogs({
        address: this.addresses,
        topics: this.topics,
        fromBlock: block.number,
        toBlock: block.number,
      })
    );

    // The node answered for a different block at this height
    const foreign = logs.find((log) => log.blockHash !== block.hash);
    if (foreign) {
      throw new ReorgDetectedError(block.number, block.hash, foreign.blockHash);
    }

    this.logger.trace('Fetched block logs', { block: block.number, logs: logs.length });
    return logs;
  }
}
