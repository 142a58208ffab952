import { describe, it, expect, beforeEach, vi } from "vitest";
import type { BlockEvent } from "@chainfeed/core";
import {
  FakeClock,
  MockChainClient,
  createBlockFixture,
  createChain,
  createMockLogger,
  hashFor,
} from "@chainfeed/testing";
import { BlockFeed, type BlockFeedOptions } from "./BlockFeed.ts";
import {
  BlockNotFoundError,
  FeedCancelledError,
  FeedRangeCompleteError,
  ReorgDetectedError,
} from "./errors.ts";

describe("BlockFeed", () => {
  let client: MockChainClient;
  let clock: FakeClock;
  let controller: AbortController;
  let events: BlockEvent[];

  const createFeed = (options: Partial<BlockFeedOptions> = {}) =>
    new BlockFeed({
      client,
      logger: createMockLogger(),
      clock,
      signal: controller.signal,
      pollingInterval: 500,
      ...options,
    });

  /** Collects events and cancels the feed after `limit` deliveries */
  const collectUntil = (limit: number) => (event: BlockEvent) => {
    events.push(event);
    if (events.length === limit) controller.abort();
  };

  const deliveredNumbers = () => events.map((event) => event.block.number);

  beforeEach(() => {
    client = new MockChainClient();
    clock = new FakeClock();
    controller = new AbortController();
    events = [];
  });

  describe("forEachBlock", () => {
    it("should deliver blocks with traces and stop on a handler error", async () => {
      const traceClient = new MockChainClient();
      const blocks = createChain(1n, 3n);
      client.queueBlockNumbers(1n, 2n, 3n);
      client.addBlocks(blocks);
      const handlerError = new Error("test");

      const feed = createFeed({
        traceClient,
        start: 1n,
        tracing: true,
        maxBlockAge: 60 * 60 * 1000,
      });
      const terminal = feed.subscribe((event) => {
        events.push(event);
        if (events.length === 3) throw handlerError;
      });

      expect(await feed.forEachBlock()).toBe(handlerError);
      expect(await terminal).toBe(handlerError);
      expect(events).toEqual(blocks.map((block) => ({ type: "block", block, traces: [] })));
      expect(traceClient.callsTo("traceBlock")).toEqual([1n, 2n, 3n]);
      expect(client.callsTo("traceBlock")).toEqual([]);
    });

    it("should deliver N contiguous blocks in order with linked parents", async () => {
      client.setBlockNumber(5n);
      client.addBlocks(createChain(1n, 5n));

      const feed = createFeed({ start: 1n });
      const terminal = feed.subscribe(collectUntil(5));

      expect(await feed.forEachBlock()).toBeInstanceOf(FeedCancelledError);
      expect(await terminal).toBeInstanceOf(FeedCancelledError);
      expect(deliveredNumbers()).toEqual([1n, 2n, 3n, 4n, 5n]);
      for (let i = 1; i < events.length; i++) {
        expect(events[i].block.parentHash).toBe(events[i - 1].block.hash);
      }
      expect(events[0].traces).toBeNull();
    });

    it("should skip a stale block and still deliver the next one", async () => {
      const now = BigInt(clock.now() / 1000);
      client.setBlockNumber(3n);
      client.addBlocks(
        createChain(1n, 3n, { timestamp: (n) => (n === 2n ? now - 3600n : now) })
      );

      const feed = createFeed({ start: 1n, maxBlockAge: 60_000 });
      feed.subscribe(collectUntil(2));

      expect(await feed.forEachBlock()).toBeInstanceOf(FeedCancelledError);
      expect(deliveredNumbers()).toEqual([1n, 3n]);
      expect(client.callsTo("getBlock")).toEqual([1n, 2n, 3n]);
    });

    it("should stop after exactly k deliveries when cancelled", async () => {
      client.setBlockNumber(10n);
      client.addBlocks(createChain(1n, 10n));

      const feed = createFeed({ start: 1n });
      feed.subscribe(collectUntil(2));

      const terminal = await feed.forEachBlock();

      expect(terminal).toBeInstanceOf(FeedCancelledError);
      expect(deliveredNumbers()).toEqual([1n, 2n]);
      expect(client.callsTo("getBlock")).toEqual([1n, 2n]);
    });

    it("should not touch the client when already cancelled", async () => {
      controller.abort();
      const feed = createFeed({ start: 1n });

      expect(await feed.forEachBlock()).toBeInstanceOf(FeedCancelledError);
      expect(client.calls).toEqual([]);
    });

    it("should wait for the confirmation offset", async () => {
      client.queueBlockNumbers(3n, 3n, 3n, 3n, 4n);
      client.addBlocks(createChain(1n, 3n));

      const feed = createFeed({ start: 2n, offset: 1 });
      feed.subscribe(collectUntil(3));

      expect(await feed.forEachBlock()).toBeInstanceOf(FeedCancelledError);
      expect(client.callsTo("getBlock")).toEqual([1n, 2n, 3n]);
      expect(client.callsTo("getBlockNumber")).toHaveLength(5);
      expect(clock.sleeps).toEqual([500, 500]);
    });

    it("should start at the first observed head minus the offset", async () => {
      client.setBlockNumber(7n);
      client.addBlocks(createChain(1n, 7n));

      const feed = createFeed({ offset: 2 });
      feed.subscribe(collectUntil(1));

      await feed.forEachBlock();

      expect(deliveredNumbers()).toEqual([5n]);
    });

    it("should deliver to every handler in registration order", async () => {
      const order: string[] = [];
      client.setBlockNumber(2n);
      client.addBlocks(createChain(1n, 2n));

      const feed = createFeed({ start: 1n });
      feed.subscribe((event) => {
        order.push(`a${event.block.number}`);
      });
      feed.subscribe((event) => {
        order.push(`b${event.block.number}`);
        if (event.block.number === 2n) controller.abort();
      });

      await feed.forEachBlock();

      expect(order).toEqual(["a1", "b1", "a2", "b2"]);
    });
  });

  describe("errors", () => {
    it("should terminate with a client error", async () => {
      const rpcError = new Error("connection refused");
      client.setBlockNumber(1n);
      client.failOn("getBlock", rpcError);

      const feed = createFeed({ start: 1n });

      expect(await feed.forEachBlock()).toBe(rpcError);
    });

    it("should terminate when the node has no block at an eligible height", async () => {
      client.setBlockNumber(4n);

      const terminal = await createFeed({ start: 4n }).forEachBlock();

      expect(terminal).toBeInstanceOf(BlockNotFoundError);
      expect(terminal.message).toBe("Block 4 not found");
    });

    it("should treat a trace failure as fatal", async () => {
      const traceError = new Error("trace_block unsupported");
      client.setBlockNumber(1n);
      client.addBlocks(createChain(1n, 1n));
      client.failOn("traceBlock", traceError);

      const feed = createFeed({ start: 1n, tracing: true });
      feed.subscribe(collectUntil(1));

      expect(await feed.forEachBlock()).toBe(traceError);
      expect(events).toEqual([]);
    });

    it("should report a reorg when the parent hash changed", async () => {
      client.setBlockNumber(3n);
      client.addBlocks([createBlockFixture(1n), createBlockFixture(2n, { parentFork: 1 })]);

      const feed = createFeed({ start: 1n });
      feed.subscribe(collectUntil(5));

      const terminal = await feed.forEachBlock();

      expect(terminal).toBeInstanceOf(ReorgDetectedError);
      expect(terminal).toMatchObject({
        blockNumber: 1n,
        expectedHash: hashFor(1n),
        actualHash: hashFor(1n, 1),
      });
      expect(deliveredNumbers()).toEqual([1n]);
    });
  });

  describe("ranges", () => {
    it("should backfill a range at the configured rate", async () => {
      client.setBlockNumber(100n);
      client.addBlocks(createChain(5n, 7n));

      const feed = createFeed();
      feed.subscribe((event) => {
        events.push(event);
      });
      feed.configureRange(5n, 7n, 10);

      const terminal = await feed.forEachBlock();

      expect(terminal).toBeInstanceOf(FeedRangeCompleteError);
      expect(terminal.message).toBe("Block range completed at 7");
      expect(deliveredNumbers()).toEqual([5n, 6n, 7n]);
      expect(clock.sleeps).toEqual([100, 100]);
    });

    it("should not fetch again when cancelled during the rate limit wait", async () => {
      client.setBlockNumber(100n);
      client.addBlocks(createChain(1n, 5n));
      vi.spyOn(clock, "sleep").mockImplementation(async () => {
        controller.abort();
      });

      const feed = createFeed();
      feed.subscribe((event) => {
        events.push(event);
      });
      feed.configureRange(1n, 5n, 1);

      expect(await feed.forEachBlock()).toBeInstanceOf(FeedCancelledError);
      expect(deliveredNumbers()).toEqual([1n]);
      expect(client.callsTo("getBlock")).toEqual([1n]);
    });

    it("should run the range in the background with startRange", async () => {
      client.setBlockNumber(100n);
      client.addBlocks(createChain(5n, 7n));

      const feed = createFeed();
      const terminal = feed.subscribe((event) => {
        events.push(event);
      });
      feed.startRange(5n, 7n, 1000);
      feed.start();

      expect(feed.isStarted()).toBe(true);
      expect(await terminal).toBeInstanceOf(FeedRangeCompleteError);
      expect(client.callsTo("getBlock")).toEqual([5n, 6n, 7n]);
    });

    it("should reject invalid or late range configuration", () => {
      const feed = createFeed();

      expect(() => feed.configureRange(7n, 5n, 1)).toThrow("Invalid block range: 7..5");
      expect(() => feed.configureRange(1n, 2n, 0)).toThrow("Rate must be positive, got 0");

      feed.start();
      expect(() => feed.configureRange(1n, 2n, 1)).toThrow(
        "Cannot configure a range on a started feed"
      );
      controller.abort();
    });
  });

  describe("lifecycle", () => {
    it("should not be started before start", () => {
      expect(createFeed().isStarted()).toBe(false);
    });

    it("should return the settled terminal to late subscribers", async () => {
      controller.abort();
      const feed = createFeed({ start: 1n });
      const first = await feed.forEachBlock();

      expect(await feed.subscribe(() => {})).toBe(first);
      expect(await feed.forEachBlock()).toBe(first);
    });

    it("should use its name", () => {
      expect(createFeed().name()).toBe("block-feed");
      expect(createFeed({ name: "agents" }).name()).toBe("agents");
    });

    it("should report health", async () => {
      client.setBlockNumber(100n);
      client.addBlocks(createChain(5n, 6n));

      const feed = createFeed();
      expect(feed.health()).toEqual([
        { name: "next-block", status: "unknown", details: "" },
        { name: "last-delivered", status: "unknown", details: "" },
        { name: "terminal", status: "unknown", details: "" },
      ]);

      feed.subscribe(() => {});
      feed.configureRange(5n, 6n, 1000);
      await feed.forEachBlock();

      expect(feed.health()).toEqual([
        { name: "next-block", status: "ok", details: "7" },
        { name: "last-delivered", status: "ok", details: "6 (2 delivered, 0 stale)" },
        { name: "terminal", status: "info", details: "Block range completed at 6" },
      ]);
    });

    it("should report a failed terminal as an error", async () => {
      client.setBlockNumber(1n);
      client.failOn("getBlock", new Error("boom"));

      const feed = createFeed({ start: 1n });
      await feed.forEachBlock();

      expect(feed.health()[2]).toEqual({ name: "terminal", status: "error", details: "boom" });
    });

    it("should reject a negative offset", () => {
      expect(() => createFeed({ offset: -1 })).toThrow("Block offset must not be negative, got -1");
    });
  });
});
