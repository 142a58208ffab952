import type { Block } from '@chainfeed/core';

/**
 * Bounded most-recently-used map from height to the block last seen there
 */
export class RecentBlockCache {
  private readonly entries = new Map<bigint, Block>();

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`Cache capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Get the block at a height, marking it most recently used
   */
  get(height: bigint): Block | undefined {
    const block = this.entries.get(height);
    if (block === undefined) return undefined;
    this.entries.delete(height);
    this.entries.set(height, block);
    return block;
  }

  /**
   * Store a block, evicting the least recently used entry when full
   */
  set(block: Block): void {
    this.entries.delete(block.number);
    this.entries.set(block.number, block);
    if (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
  }

  /**
   * Drop every entry at or above `height`
   * @returns number of entries removed
   */
  invalidateFrom(height: bigint): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key >= height) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }
}
