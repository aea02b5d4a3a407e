/**
 * Shared fixtures: a DriveFs over a fresh in-memory store.
 */

import type { DriveFsOptions } from "../src/core/config";
import { MemoryNodeStore } from "../src/core/drive/memoryStore";
import { DriveFs } from "../src/core/fs";

export interface Fixture {
  store: MemoryNodeStore;
  fs: DriveFs;
}

export function setup(options: DriveFsOptions = {}): Fixture {
  let tick = Date.UTC(2024, 0, 1);
  const store = new MemoryNodeStore({ now: () => new Date(tick++) });
  return { store, fs: new DriveFs(store, options) };
}

/** Create `path` (and its parents) holding `content`. */
export async function writeText(fs: DriveFs, path: string, content = "Hello World"): Promise<void> {
  await fs.writeFile(path, content);
}

export async function readText(fs: DriveFs, path: string): Promise<string> {
  return (await fs.readFile(path)).toString("utf8");
}

/** Deterministic pseudo-random bytes. */
export function pattern(length: number, seed = 7): Buffer {
  const out = Buffer.alloc(length);
  let x = seed;
  for (let i = 0; i < length; i++) {
    x = (x * 1103515245 + 12345) & 0x7fffffff;
    out[i] = x & 0xff;
  }
  return out;
}
