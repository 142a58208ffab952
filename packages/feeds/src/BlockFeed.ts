import { createBlockEvent, type Block, type IChainClient, type ILogger } from '@chainfeed/core';
import type { HealthReport } from '@chainfeed/health';
import type { Clock } from './clock.ts';
import { systemClock } from './clock.ts';
import {
  BlockNotFoundError,
  FeedCancelledError,
  FeedRangeCompleteError,
  ReorgDetectedError,
  isExpectedTermination,
  toError,
} from './errors.ts';
import { RateLimiter } from './RateLimiter.ts';
import { RecentBlockCache } from './RecentBlockCache.ts';
import type { BlockHandler, IBlockFeed } from './types.ts';

/**
 * Block feed options
 */
export interface BlockFeedOptions {
  client: IChainClient;
  /** Client used for `trace_block`; defaults to `client` */
  traceClient?: IChainClient;
  logger: ILogger;
  /**
   * Height that must be reached by the head before the first block
   * (`start - offset`) is fetched. When omitted, the first observed head.
   */
  start?: bigint | null;
  /** Confirmation depth in blocks */
  offset?: number;
  /** Blocks older than this many milliseconds are skipped */
  maxBlockAge?: number | null;
  tracing?: boolean;
  /** Wait between head polls while no block is eligible, in milliseconds */
  pollingInterval?: number;
  /** Capacity of the recent-block cache */
  cacheSize?: number;
  signal?: AbortSignal;
  name?: string;
  clock?: Clock;
}

function createTerminalSignal(): { promise: Promise<Error>; resolve: (error: Error) => void } {
  let resolve: (error: Error) => void = () => {};
  const promise = new Promise<Error>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/**
 * Follows the chain block by block behind a confirmation offset.
 *
 * One sequential loop per feed: poll the head, fetch the next eligible
 * block, check it links to the cached parent, then hand it to every
 * subscriber in order. Whatever ends the loop (cancellation, a completed
 * range, a reorg, a client or handler error) becomes the single terminal
 * value of every subscription.
 */
export class BlockFeed implements IBlockFeed {
  private readonly client: IChainClient;
  private readonly traceClient: IChainClient;
  private readonly logger: ILogger;
  private readonly offset: bigint;
  private readonly maxBlockAge: number | null;
  private readonly tracing: boolean;
  private readonly pollingInterval: number;
  private readonly signal: AbortSignal | undefined;
  private readonly feedName: string;
  private readonly clock: Clock;
  private readonly cache: RecentBlockCache;
  private readonly handlers: BlockHandler[] = [];
  private readonly terminalSignal = createTerminalSignal();

  /** Next height to fetch; null until the first head is observed */
  private next: bigint | null;
  private end: bigint | null = null;
  private limiter: RateLimiter | null = null;
  private started = false;
  private running: Promise<Error> | null = null;
  private terminal: Error | null = null;
  private lastDelivered: Block | null = null;
  private deliveredCount = 0;
  private skippedCount = 0;

  constructor(options: BlockFeedOptions) {
    this.client = options.client;
    this.traceClient = options.traceClient ?? options.client;
    this.feedName = options.name ?? 'block-feed';
    this.logger = options.logger.child({ module: 'BlockFeed', feed: this.feedName });
    this.offset = BigInt(options.offset ?? 0);
    this.maxBlockAge = options.maxBlockAge ?? null;
    this.tracing = options.tracing ?? false;
    this.pollingInterval = options.pollingInterval ?? 2000;
    this.signal = options.signal;
    this.clock = options.clock ?? systemClock;
    this.cache = new RecentBlockCache(options.cacheSize ?? 1000);

    if (this.offset < 0n) {
      throw new Error(`Block offset must not be negative, got ${this.offset}`);
    }
    const start = options.start ?? null;
    this.next = start === null ? null : this.fetchHeightFor(start);
  }

  /**
   * Register a handler. The returned promise settles once with the terminal value.
   */
  subscribe(handler: BlockHandler): Promise<Error> {
    if (this.terminal) {
      return Promise.resolve(this.terminal);
    }
    this.handlers.push(handler);
    return this.terminalSignal.promise;
  }

  /**
   * Run the follow loop and resolve with its terminal value
   */
  forEachBlock(): Promise<Error> {
    this.started = true;
    this.running ??= this.run();
    return this.running;
  }

  /**
   * Run the follow loop in the background
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.running ??= this.run();
  }

  isStarted(): boolean {
    return this.started;
  }

  /**
   * Configure a bounded backfill over `start..end` without starting it
   * @param rate maximum block-fetch attempts per second
   */
  configureRange(start: bigint, end: bigint, rate: number): void {
    if (this.started) {
      throw new Error('Cannot configure a range on a started feed');
    }
    if (start < 0n || end < start) {
      throw new Error(`Invalid block range: ${start}..${end}`);
    }
    this.limiter = new RateLimiter(rate, this.clock);
    this.next = start;
    this.end = end;
  }

  /**
   * Backfill `start..end` inclusive at no more than `rate` fetch attempts per second
   */
  startRange(start: bigint, end: bigint, rate: number): void {
    this.configureRange(start, end, rate);
    this.start();
  }

  name(): string {
    return this.feedName;
  }

  health(): HealthReport[] {
    return [
      {
        name: 'next-block',
        status: this.next === null ? 'unknown' : 'ok',
        details: this.next === null ? '' : this.next.toString(),
      },
      {
        name: 'last-delivered',
        status: this.lastDelivered ? 'ok' : 'unknown',
        details: this.lastDelivered
          ? `${this.lastDelivered.number} (${this.deliveredCount} delivered, ${this.skippedCount} stale)`
          : '',
      },
      this.terminalReport(),
    ];
  }

  private terminalReport(): HealthReport {
    if (!this.terminal) {
      return { name: 'terminal', status: this.started ? 'ok' : 'unknown', details: '' };
    }
    return {
      name: 'terminal',
      status: isExpectedTermination(this.terminal) ? 'info' : 'error',
      details: this.terminal.message,
    };
  }

  private fetchHeightFor(start: bigint): bigint {
    const height = start - this.offset;
    return height < 0n ? 0n : height;
  }

  private async run(): Promise<Error> {
    let terminal: Error;
    try {
      terminal = await this.loop();
    } catch (error) {
      terminal = toError(error);
    }

    this.terminal = terminal;
    this.cache.clear();

    if (isExpectedTermination(terminal)) {
      this.logger.info(terminal.message, { delivered: this.deliveredCount });
    } else {
      this.logger.warn('Block feed stopped', { error: terminal, next: this.next ?? undefined });
    }

    this.terminalSignal.resolve(terminal);
    return terminal;
  }

  private async loop(): Promise<Error> {
    for (;;) {
      if (this.signal?.aborted) {
        return new FeedCancelledError();
      }
      if (this.end !== null && this.next !== null && this.next > this.end) {
        return new FeedRangeCompleteError(this.end);
      }
      if (this.limiter) {
        await this.limiter.wait(this.signal);
        // The wait ends early on abort
        if (this.signal?.aborted) {
          return new FeedCancelledError();
        }
      }

      const latest = await this.client.getBlockNumber();
      if (this.next === null) {
        this.next = this.fetchHeightFor(latest);
        this.logger.debug('Starting from chain head', { head: latest, block: this.next });
      }

      const height = this.next;
      if (latest < height + this.offset) {
        this.logger.trace('Waiting for confirmations', { head: latest, block: height });
        await this.clock.sleep(this.pollingInterval, this.signal);
        continue;
      }

      const block = await this.client.getBlock(height);
      if (!block) {
        throw new BlockNotFoundError(height);
      }
      const traces = this.tracing ? await this.traceClient.traceBlock(height) : null;

      this.checkReorg(block);
      this.cache.set(block);

      if (this.isStale(block)) {
        this.skippedCount++;
        this.logger.debug('Skipping stale block', { block: block.number, timestamp: block.timestamp });
      } else {
        const event = createBlockEvent(block, traces);
        for (const handler of this.handlers) {
          await handler(event);
        }
        this.lastDelivered = block;
        this.deliveredCount++;
      }

      this.next = height + 1n;
    }
  }

  /**
   * The cached block one below must be the parent the node reports now
   */
  private checkReorg(block: Block): void {
    if (block.number === 0n) return;
    const parent = this.cache.get(block.number - 1n);
    if (parent && parent.hash !== block.parentHash) {
      const removed = this.cache.invalidateFrom(parent.number);
      this.logger.warn('Parent hash mismatch', {
        block: block.number,
        cached: parent.hash,
        parentHash: block.parentHash,
        invalidated: removed,
      });
      throw new ReorgDetectedError(parent.number, parent.hash, block.parentHash);
    }
  }

  private isStale(block: Block): boolean {
    if (this.maxBlockAge === null) return false;
    const ageMs = this.clock.now() - Number(block.timestamp) * 1000;
    return ageMs > this.maxBlockAge;
  }
}
