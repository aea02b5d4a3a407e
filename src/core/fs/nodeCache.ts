/**
 * Path -> node cache for the active root.
 *
 * Entries are immutable snapshots; updates replace them. Keys are normalized
 * root-relative paths, so evicting a path must also evict everything below it.
 * `generation` advances on every eviction; a lookup started under an older
 * generation must not write its result back.
 */

import type { DriveNode } from "../drive/types";
import { isWithin } from "./path";

export interface NodeCacheStats {
  size: number;
  hits: number;
  misses: number;
}

export class NodeCache {
  private entries: Map<string, DriveNode> = new Map();
  private hits = 0;
  private misses = 0;
  private gen = 0;

  get generation(): number {
    return this.gen;
  }

  get(path: string): DriveNode | undefined {
    const node = this.entries.get(path);
    if (node) this.hits++;
    else this.misses++;
    return node;
  }

  set(path: string, node: DriveNode): void {
    this.entries.set(path, node);
  }

  /** Remove one entry. Returns whether it was present. */
  evict(path: string): boolean {
    return this.entries.delete(path);
  }

  /** Remove `path` and every cached descendant. Returns how many entries went. */
  evictTree(path: string): number {
    this.gen++;
    let removed = 0;
    for (const key of Array.from(this.entries.keys())) {
      if (isWithin(key, path)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.gen++;
    this.entries.clear();
  }

  stats(): NodeCacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses };
  }
}
