/**
 * MemoryNodeStore - in-process RemoteNodeStore.
 *
 * Mirrors the backend behaviour the filesystem layer has to cope with:
 * - names are not unique under a parent
 * - a node may have several parents
 * - trashing a folder trashes everything below it, but only the folder carries the flag
 * - deleting a folder cascades
 *
 * Every call is recorded in `calls` so tests can assert on round-trips.
 */

import type { Readable } from "stream";
import { ulid } from "ulid";
import { RemoteStatusError } from "../errors";
import {
  CreateNodeInput,
  DriveNode,
  NodeKind,
  NodePage,
  NodePatch,
  PageOptions,
  RemoteNodeStore,
} from "./types";

interface StoredNode {
  id: string;
  name: string;
  parents: string[];
  kind: NodeKind;
  content: Buffer;
  modifiedTime: Date;
  accessedTime?: Date;
  trashed: boolean;
}

export type StoreOperation = keyof RemoteNodeStore;

export interface MemoryNodeStoreOptions {
  now?: () => Date;
  topName?: string;
}

const DEFAULT_PAGE_SIZE = 100;

export class MemoryNodeStore implements RemoteNodeStore {
  readonly topId: string;
  /** Every call in issue order. */
  readonly calls: StoreOperation[] = [];

  private nodes: Map<string, StoredNode> = new Map();
  private faults: Map<StoreOperation, Error> = new Map();
  private now: () => Date;

  constructor(options: MemoryNodeStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.topId = ulid();
    this.nodes.set(this.topId, {
      id: this.topId,
      name: options.topName ?? "My Drive",
      parents: [],
      kind: "directory",
      content: Buffer.alloc(0),
      modifiedTime: this.now(),
      trashed: false,
    });
  }

  /** Make the next call of `operation` fail with `error`. */
  injectFault(operation: StoreOperation, error: Error): void {
    this.faults.set(operation, error);
  }

  /** Number of recorded calls, optionally for one operation. */
  callCount(operation?: StoreOperation): number {
    if (!operation) return this.calls.length;
    return this.calls.filter((c) => c === operation).length;
  }

  /** Raw content, bypassing call recording. */
  peekContent(id: string): string | undefined {
    return this.nodes.get(id)?.content.toString("utf8");
  }

  async getTop(): Promise<DriveNode> {
    this.record("getTop");
    return this.snapshot(this.require(this.topId));
  }

  async getNode(id: string): Promise<DriveNode> {
    this.record("getNode");
    return this.snapshot(this.require(id === "root" ? this.topId : id));
  }

  async findChild(parentId: string, name: string): Promise<DriveNode | null> {
    this.record("findChild");
    const match = this.childrenOf(parentId).find((n) => n.name === name);
    return match ? this.snapshot(match) : null;
  }

  async listChildren(parentId: string, options: PageOptions = {}): Promise<NodePage> {
    this.record("listChildren");
    this.require(parentId);
    const sorted = this.childrenOf(parentId).sort(byName);
    return this.page(sorted, options);
  }

  async listTrashed(options: PageOptions = {}): Promise<NodePage> {
    this.record("listTrashed");
    const trashed = Array.from(this.nodes.values())
      .filter((n) => n.id !== this.topId && this.isTrashed(n))
      .sort(byName);
    return this.page(trashed, options);
  }

  async createNode(input: CreateNodeInput): Promise<DriveNode> {
    this.record("createNode");
    this.require(input.parentId);
    const node: StoredNode = {
      id: ulid(),
      name: input.name,
      parents: [input.parentId],
      kind: input.kind,
      content: Buffer.alloc(0),
      modifiedTime: input.modifiedTime ?? this.now(),
      trashed: false,
    };
    this.nodes.set(node.id, node);
    return this.snapshot(node);
  }

  async patchNode(id: string, patch: NodePatch): Promise<DriveNode> {
    this.record("patchNode");
    const node = this.require(id);
    for (const parentId of patch.addParents ?? []) this.require(parentId);

    // all checks passed: apply in one step
    if (patch.name !== undefined) node.name = patch.name;
    if (patch.removeParents?.length) {
      const removed = new Set(patch.removeParents);
      node.parents = node.parents.filter((p) => !removed.has(p));
    }
    for (const parentId of patch.addParents ?? []) {
      if (!node.parents.includes(parentId)) node.parents.push(parentId);
    }
    if (patch.trashed !== undefined) node.trashed = patch.trashed;
    if (patch.modifiedTime) node.modifiedTime = patch.modifiedTime;
    if (patch.accessedTime) node.accessedTime = patch.accessedTime;
    return this.snapshot(node);
  }

  async writeContent(id: string, source: Readable): Promise<DriveNode> {
    this.record("writeContent");
    const node = this.require(id);
    if (node.kind === "directory") {
      throw new RemoteStatusError("cannot upload content to a folder", 400, "badContent");
    }
    const chunks: Buffer[] = [];
    for await (const chunk of source) {
      chunks.push(Buffer.from(chunk));
    }
    node.content = Buffer.concat(chunks);
    node.modifiedTime = this.now();
    return this.snapshot(node);
  }

  async readContent(id: string): Promise<Buffer> {
    this.record("readContent");
    const node = this.require(id);
    if (node.kind === "directory") {
      throw new RemoteStatusError("folders have no content", 403, "fileNotDownloadable");
    }
    return Buffer.from(node.content);
  }

  async deleteNode(id: string): Promise<void> {
    this.record("deleteNode");
    this.require(id);
    this.cascadeDelete(id);
  }

  private cascadeDelete(id: string): void {
    this.nodes.delete(id);
    for (const node of Array.from(this.nodes.values())) {
      if (!node.parents.includes(id)) continue;
      node.parents = node.parents.filter((p) => p !== id);
      if (node.parents.length === 0) this.cascadeDelete(node.id);
    }
  }

  private childrenOf(parentId: string): StoredNode[] {
    return Array.from(this.nodes.values()).filter(
      (n) => n.parents.includes(parentId) && !n.trashed
    );
  }

  private isTrashed(node: StoredNode, seen: Set<string> = new Set()): boolean {
    if (node.trashed) return true;
    if (seen.has(node.id)) return false;
    seen.add(node.id);
    if (node.parents.length === 0) return false;
    // trashed only when every parent chain is trashed
    return node.parents.every((parentId) => {
      const parent = this.nodes.get(parentId);
      return parent ? this.isTrashed(parent, seen) : false;
    });
  }

  private page(nodes: StoredNode[], options: PageOptions): NodePage {
    const offset = options.pageToken ? Number(options.pageToken) : 0;
    const size = options.pageSize ?? DEFAULT_PAGE_SIZE;
    const end = offset + size;
    return {
      nodes: nodes.slice(offset, end).map((n) => this.snapshot(n)),
      nextPageToken: end < nodes.length ? String(end) : undefined,
    };
  }

  private record(operation: StoreOperation): void {
    this.calls.push(operation);
    const fault = this.faults.get(operation);
    if (fault) {
      this.faults.delete(operation);
      throw fault;
    }
  }

  private require(id: string): StoredNode {
    const node = this.nodes.get(id);
    if (!node) {
      throw new RemoteStatusError(`File not found: ${id}.`, 404, "notFound");
    }
    return node;
  }

  private snapshot(node: StoredNode): DriveNode {
    const snapshot: DriveNode = {
      id: node.id,
      name: node.name,
      parents: Object.freeze([...node.parents]),
      kind: node.kind,
      size: node.content.length,
      modifiedTime: new Date(node.modifiedTime.getTime()),
      accessedTime: node.accessedTime ? new Date(node.accessedTime.getTime()) : undefined,
      trashed: this.isTrashed(node),
    };
    return Object.freeze(snapshot);
  }
}

function byName(a: StoredNode, b: StoredNode): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}
