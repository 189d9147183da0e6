// File overview:
// - Purpose: In-memory item storage, the only shared mutable state of the process.
// - Reached from: `ItemsService` (injected as a singleton provider of `ItemsModule`).
// - Provides: insert/get/remove/clear/list by name, id index and id allocation.
// - Layout: names are striped over SHARD_COUNT maps by an FNV-1a hash; ids live in a separate index.
import { Injectable } from '@nestjs/common';
import { Item } from './item.entity';

export const SHARD_COUNT = 16;

export type InsertResult =
  | { ok: true; item: Item }
  | { ok: false; reason: 'duplicate-name' | 'duplicate-id' };

/**
 * Striped name -> Item map.
 *
 * Every method runs synchronously, so each call completes inside a single
 * event-loop turn and concurrent requests can never observe a half-applied
 * mutation. Two inserts racing on one name always yield exactly one winner.
 */
@Injectable()
export class ItemStore {
  private readonly shards = Array.from({ length: SHARD_COUNT }, () => new Map<string, Item>());
  private readonly ids = new Set<number>();
  private counter = 0;

  get size(): number {
    return this.shards.reduce((total, shard) => total + shard.size, 0);
  }

  insert(item: Item): InsertResult {
    const shard = this.shardFor(item.name);
    if (shard.has(item.name)) {
      return { ok: false, reason: 'duplicate-name' };
    }
    if (this.ids.has(item.id)) {
      return { ok: false, reason: 'duplicate-id' };
    }
    const stored = { ...item };
    shard.set(stored.name, stored);
    this.ids.add(stored.id);
    return { ok: true, item: { ...stored } };
  }

  get(name: string): Item | undefined {
    const item = this.shardFor(name).get(name);
    return item ? { ...item } : undefined;
  }

  remove(name: string): Item | undefined {
    const shard = this.shardFor(name);
    const item = shard.get(name);
    if (!item) return undefined;
    shard.delete(name);
    this.ids.delete(item.id);
    return { ...item };
  }

  clear(): number {
    let removed = 0;
    for (const shard of this.shards) {
      removed += shard.size;
      shard.clear();
    }
    this.ids.clear();
    return removed;
  }

  /** Snapshot of all items, sorted by name. */
  list(): Item[] {
    const items: Item[] = [];
    for (const shard of this.shards) {
      for (const item of shard.values()) items.push({ ...item });
    }
    return items.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  hasId(id: number): boolean {
    return this.ids.has(id);
  }

  /**
   * Next server-assigned id. Monotonic, never handed out twice, and skips ids
   * that callers already claimed explicitly.
   */
  nextId(): number {
    do {
      this.counter += 1;
    } while (this.ids.has(this.counter));
    return this.counter;
  }

  private shardFor(name: string): Map<string, Item> {
    return this.shards[fnv1a(name) % this.shards.length];
  }
}

// 32-bit FNV-1a over UTF-16 code units
function fnv1a(value: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < value.length; i++) {
    hash ^= value.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}
