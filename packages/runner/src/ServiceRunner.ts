import { getCommonChain, type ResolvedConfig } from "@chainfeed/config";
import { RpcChainClient, type IChainClient, type ILogger } from "@chainfeed/core";
import type { Clock } from "@chainfeed/feeds";
import {
  HealthServer,
  checkerFrom,
  summarizeReports,
  type HealthChecker,
  type HealthReport,
  type HealthReporter,
} from "@chainfeed/health";
import { RegistryListener, type RegistryHandlers } from "@chainfeed/registry";

/**
 * Service runner options
 */
export interface ServiceRunnerOptions {
  config: ResolvedConfig;
  logger: ILogger;
  handlers: RegistryHandlers;
  /** Chain client; built from `config.chain` when omitted */
  client?: IChainClient;
  /** Aborting it stops the runner's feed */
  signal?: AbortSignal;
  clock?: Clock;
}

/**
 * Reports which chain and endpoint the runner follows
 */
function endpointReporter(config: ResolvedConfig): HealthReporter {
  return {
    name: () => "chain",
    health: () => [
      {
        name: "endpoint",
        status: "ok",
        details: `${config.chain.id} via ${config.chain.rpcUrl}`,
      },
    ],
  };
}

/**
 * Service runner - wires configuration, chain client, registry listener
 * and the optional health server
 */
export class ServiceRunner {
  private readonly config: ResolvedConfig;
  private readonly logger: ILogger;
  private readonly controller = new AbortController();
  private readonly listener: RegistryListener;
  private readonly checker: HealthChecker;
  private readonly healthServer: HealthServer | null;

  private isRunning = false;

  constructor(options: ServiceRunnerOptions) {
    this.config = options.config;
    this.logger = options.logger;

    const { chain, feed } = this.config;
    const client =
      options.client ??
      new RpcChainClient({
        chainId: chain.id,
        url: chain.rpcUrl,
        timeout: chain.timeout,
        retryCount: chain.retryCount,
      });

    if (options.signal?.aborted) {
      this.controller.abort();
    } else {
      options.signal?.addEventListener("abort", () => this.controller.abort(), { once: true });
    }

    this.warnOnShallowOffset();

    this.listener = new RegistryListener({
      client,
      logger: this.logger,
      contracts: this.config.contracts,
      handlers: options.handlers,
      startBlock: feed.startBlock === null ? null : BigInt(feed.startBlock),
      blockOffset: feed.blockOffset,
      // Configured in seconds
      maxBlockAge: feed.maxBlockAge === null ? null : feed.maxBlockAge * 1000,
      pollingInterval: feed.pollingInterval,
      cacheSize: feed.cacheSize,
      signal: this.controller.signal,
      clock: options.clock,
    });

    this.checker = checkerFrom(summarizeReports, this.listener, endpointReporter(this.config));
    this.healthServer = this.config.health.enabled
      ? new HealthServer({
          checker: this.checker,
          logger: this.logger,
          host: this.config.health.host,
          port: this.config.health.port,
        })
      : null;
  }

  /**
   * Follow the chain until stopped or an error ends the feed
   */
  async listen(): Promise<Error> {
    await this.startServices();
    this.logger.info("Listening for registry events", {
      chainId: this.config.chain.id,
      startBlock: this.config.feed.startBlock ?? "head",
      blockOffset: this.config.feed.blockOffset,
    });
    return this.listener.listen();
  }

  /**
   * Handle the registry logs of the last `blocks` blocks once
   */
  async processLastBlocks(blocks: bigint): Promise<void> {
    this.logger.info(`Processing logs of the last ${blocks} blocks`);
    await this.listener.processLastBlocks(blocks);
  }

  /**
   * Handle `start..end` inclusive at no more than `rate` blocks per second
   */
  async backfill(start: bigint, end: bigint, rate: number): Promise<Error> {
    await this.startServices();
    this.logger.info("Backfilling registry events", { from: start, to: end, rate });
    return this.listener.backfill(start, end, rate);
  }

  /**
   * Cancel the feed and close the health server
   */
  async stop(): Promise<void> {
    this.controller.abort();
    if (!this.isRunning) return;

    await this.healthServer?.stop();
    this.isRunning = false;
    this.logger.info("All services stopped");
  }

  /**
   * Current health reports, summary last
   */
  health(): HealthReport[] {
    return this.checker();
  }

  getHealthServer(): HealthServer | null {
    return this.healthServer;
  }

  private async startServices(): Promise<void> {
    if (this.isRunning) return;
    this.isRunning = true;
    await this.healthServer?.start();
  }

  private warnOnShallowOffset(): void {
    const known = getCommonChain(this.config.chain.id);
    if (known && this.config.feed.blockOffset < known.blockOffset) {
      this.logger.warn(`Block offset is below the usual confirmation depth for ${known.name}`, {
        blockOffset: this.config.feed.blockOffset,
        recommended: known.blockOffset,
      });
    }
  }
}
