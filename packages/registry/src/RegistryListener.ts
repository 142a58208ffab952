import type { ContractsConfig } from '@chainfeed/config';
import type { Block, IChainClient, ILogger, Log } from '@chainfeed/core';
import { FeedCancelledError, LogFeed, type Clock } from '@chainfeed/feeds';
import type { HealthReport, HealthReporter } from '@chainfeed/health';
import { dispatchMessage, type RegistryHandlers } from './dispatch.ts';
import { RegistryEventMapper } from './RegistryEventMapper.ts';

/**
 * Registry listener options
 */
export interface RegistryListenerOptions {
  client: IChainClient;
  logger: ILogger;
  contracts: ContractsConfig;
  handlers: RegistryHandlers;
  startBlock?: bigint | null;
  blockOffset?: number;
  /** Milliseconds */
  maxBlockAge?: number | null;
  pollingInterval?: number;
  cacheSize?: number;
  signal?: AbortSignal;
  name?: string;
  clock?: Clock;
}

/**
 * Follows the registry contracts and routes every mapped message to its handler
 */
export class RegistryListener implements HealthReporter {
  private readonly logger: ILogger;
  private readonly handlers: RegistryHandlers;
  private readonly signal: AbortSignal | undefined;
  private readonly mapper: RegistryEventMapper;
  private readonly logs: LogFeed;

  constructor(options: RegistryListenerOptions) {
    this.logger = options.logger.child({ module: 'RegistryListener' });
    this.handlers = options.handlers;
    this.signal = options.signal;
    this.mapper = new RegistryEventMapper(options.contracts);
    this.logs = new LogFeed({
      client: options.client,
      logger: options.logger,
      addresses: this.mapper.addresses(),
      start: options.startBlock,
      offset: options.blockOffset,
      maxBlockAge: options.maxBlockAge,
      pollingInterval: options.pollingInterval,
      cacheSize: options.cacheSize,
      signal: options.signal,
      name: options.name ?? 'registry',
      clock: options.clock,
    });
  }

  /**
   * Follow the chain until cancelled or an error ends the feed
   */
  listen(): Promise<Error> {
    return this.logs.forEachLog(
      (log) => this.handleLog(log),
      (block) => this.handleAfterBlock(block)
    );
  }

  /**
   * Handle the logs of the last `blocks` blocks once, without `afterBlock`
   */
  async processLastBlocks(blocks: bigint): Promise<void> {
    const logs = await this.logs.getLogsForLastBlocks(blocks);
    for (const log of logs) {
      await this.handleLog(log);
    }
  }

  /**
   * Handle `start..end` inclusive at no more than `rate` blocks per second
   */
  backfill(start: bigint, end: bigint, rate: number): Promise<Error> {
    return this.logs.forEachLogInRange(
      start,
      end,
      rate,
      (log) => this.handleLog(log),
      (block) => this.handleAfterBlock(block)
    );
  }

  async handleLog(log: Log): Promise<void> {
    if (this.signal?.aborted) {
      throw new FeedCancelledError();
    }

    const message = this.mapper.map(log);
    if (!message) {
      this.logger.trace('Ignoring unmapped log', {
        block: log.blockNumber,
        contract: log.address,
        topic0: log.topic0,
      });
      return;
    }

    const logger = this.logger.child({
      block: log.blockNumber,
      txHash: log.transactionHash,
      contract: log.address,
    });

    const handled = await dispatchMessage(message, this.handlers, { logger, log });
    if (!handled) {
      logger.trace('No handler for message', { action: message.action });
      return;
    }
    logger.debug('Handled message', { action: message.action });
  }

  async handleAfterBlock(block: Block): Promise<void> {
    if (this.signal?.aborted) {
      throw new FeedCancelledError();
    }
    await this.handlers.afterBlock?.(block);
  }

  name(): string {
    return this.logs.name();
  }

  health(): HealthReport[] {
    return this.logs.health();
  }
}
