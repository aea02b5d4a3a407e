/**
 * Root scope: the active root node, path resolution and the path cache.
 *
 * Every public path is relative to the active root. Resolution walks one
 * segment at a time; each uncached segment costs exactly one findChild query.
 */

import type { EventBus } from "../eventBus";
import {
  FileNotExistError,
  NotADirectoryError,
  isNotExist,
  remoteStatus,
  wrapRemote,
} from "../errors";
import type { DriveNode, RemoteNodeStore } from "../drive/types";
import { isDirectoryNode } from "../drive/types";
import type { FsLogger } from "../logger";
import { NodeCache } from "./nodeCache";
import { joinPath, normalizePath, splitPath } from "./path";

export interface RootMembership {
  inRoot: boolean;
  /** Root-relative path of the node's parent directory ("" for direct children). */
  parentPath: string;
}

export class RootScope {
  readonly cache = new NodeCache();
  private root: DriveNode | null = null;
  private top: DriveNode | null = null;

  constructor(
    private readonly store: RemoteNodeStore,
    private readonly logger: FsLogger,
    private readonly eventBus?: EventBus
  ) {}

  /** The active root. Defaults to the backend's top. */
  async rootNode(): Promise<DriveNode> {
    if (!this.root) {
      this.root = await this.topNode();
    }
    return this.root;
  }

  async topNode(): Promise<DriveNode> {
    if (!this.top) {
      try {
        this.top = await this.store.getTop();
      } catch (err) {
        throw wrapRemote("getTop", "", err);
      }
    }
    return this.top;
  }

  /**
   * Resolve a root-relative path. Fails FileNotExistError naming the first
   * missing prefix, NotADirectoryError naming a file met along the way.
   */
  async resolve(path: string): Promise<DriveNode> {
    const root = await this.rootNode();
    return this.walk(root, normalizePath(path), this.cache);
  }

  /** Like resolve, but a missing path yields null. */
  async lookup(path: string): Promise<DriveNode | null> {
    try {
      return await this.resolve(path);
    } catch (err) {
      if (isNotExist(err)) return null;
      throw err;
    }
  }

  /**
   * Resolve `path` from the backend's top and make it the active root.
   */
  async setRootByPath(path: string): Promise<DriveNode> {
    const normalized = normalizePath(path);
    const top = await this.topNode();
    const node = await this.walk(top, normalized, null);
    if (!isDirectoryNode(node)) {
      throw new NotADirectoryError(normalized);
    }
    this.adopt(node, normalized);
    return node;
  }

  /**
   * Adopt a node as root by id. Only existence is checked.
   */
  async setRootById(id: string): Promise<DriveNode> {
    let node: DriveNode;
    try {
      node = await this.store.getNode(id);
    } catch (err) {
      if (remoteStatus(err) === 404) throw new FileNotExistError(id);
      throw wrapRemote("setRoot", id, err);
    }
    this.adopt(node);
    return node;
  }

  /**
   * Walk the parent chain of `node` upward until the active root is met.
   * With several parents the first one that resolves and is not trashed is followed.
   */
  async isInRoot(node: DriveNode): Promise<RootMembership> {
    const root = await this.rootNode();
    if (node.id === root.id) return { inRoot: true, parentPath: "" };

    const names: string[] = [];
    const seen = new Set<string>([node.id]);
    let current = node;

    for (;;) {
      if (current.parents.length === 0) {
        const top = await this.topNode();
        if (root.id !== top.id) return { inRoot: false, parentPath: "" };
        return { inRoot: true, parentPath: names.reverse().join("/") };
      }
      if (current.parents.includes(root.id)) {
        return { inRoot: true, parentPath: names.reverse().join("/") };
      }

      const next = await this.firstLiveParent(current, seen);
      if (!next) return { inRoot: false, parentPath: "" };
      seen.add(next.id);
      names.push(next.name);
      current = next;
    }
  }

  /** Evict `path` and everything below it. */
  evict(path: string): number {
    const entries = this.cache.evictTree(path);
    if (entries > 0) {
      this.eventBus?.emit("CacheEvent", { action: "evict", path, entries });
    }
    return entries;
  }

  remember(path: string, node: DriveNode): void {
    this.cache.set(normalizePath(path), node);
  }

  private async firstLiveParent(node: DriveNode, seen: Set<string>): Promise<DriveNode | null> {
    for (const parentId of node.parents) {
      if (seen.has(parentId)) continue;
      let parent: DriveNode;
      try {
        parent = await this.store.getNode(parentId);
      } catch (err) {
        if (remoteStatus(err) === 404) continue;
        throw wrapRemote("isInRoot", node.name, err);
      }
      if (!parent.trashed) return parent;
    }
    return null;
  }

  private async walk(origin: DriveNode, path: string, cache: NodeCache | null): Promise<DriveNode> {
    let current = origin;
    let prefix = "";
    const generation = cache?.generation;

    for (const segment of splitPath(path)) {
      const next = joinPath(prefix, segment);
      const cached = cache?.get(next);
      if (cached) {
        current = cached;
        prefix = next;
        continue;
      }

      if (!isDirectoryNode(current)) {
        throw new NotADirectoryError(prefix);
      }

      let child: DriveNode | null;
      try {
        child = await this.store.findChild(current.id, segment);
      } catch (err) {
        throw wrapRemote("resolve", next, err);
      }
      if (!child) {
        throw new FileNotExistError(next);
      }

      if (cache && cache.generation === generation) cache.set(next, child);
      current = child;
      prefix = next;
    }

    return current;
  }

  private adopt(node: DriveNode, path?: string): void {
    const entries = this.cache.stats().size;
    this.root = node;
    this.cache.clear();
    this.logger.info("Root changed", { rootId: node.id, path });
    this.eventBus?.emit("CacheEvent", { action: "clear", path: "", entries });
    this.eventBus?.emit("RootChangeEvent", { rootId: node.id, path });
  }
}
