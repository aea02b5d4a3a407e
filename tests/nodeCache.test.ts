/**
 * NodeCache
 */

import type { DriveNode } from "../src/core/drive/types";
import { NodeCache } from "../src/core/fs/nodeCache";

function node(id: string, name: string): DriveNode {
  return { id, name, parents: [], kind: "directory", size: 0, modifiedTime: new Date(0), trashed: false };
}

describe("NodeCache", () => {
  test("counts hits and misses", () => {
    const cache = new NodeCache();
    cache.set("a", node("1", "a"));
    expect(cache.get("a")?.id).toBe("1");
    expect(cache.get("b")).toBeUndefined();
    expect(cache.stats()).toEqual({ size: 1, hits: 1, misses: 1 });
  });

  test("evictTree removes a prefix and its descendants only", () => {
    const cache = new NodeCache();
    cache.set("a", node("1", "a"));
    cache.set("a/b", node("2", "b"));
    cache.set("a/b/c", node("3", "c"));
    cache.set("ab", node("4", "ab"));

    expect(cache.evictTree("a")).toBe(3);
    expect(cache.get("ab")?.id).toBe("4");
    expect(cache.get("a/b")).toBeUndefined();
  });

  test("clear and evictTree advance the generation", () => {
    const cache = new NodeCache();
    cache.set("x/y", node("9", "y"));
    const start = cache.generation;

    cache.evictTree("x");
    expect(cache.generation).toBe(start + 1);

    cache.clear();
    expect(cache.generation).toBe(start + 2);
    expect(cache.stats().size).toBe(0);
  });
});
