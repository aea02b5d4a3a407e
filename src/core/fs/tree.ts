/**
 * Directory tree operations over the id-based store.
 *
 * Nothing here is transactional: a failure halfway through mkdirAll leaves the
 * ancestors it already created in place.
 */

import {
  DriveFsError,
  EmptyPathError,
  FileExistsError,
  FileNotExistError,
  ForbiddenRootOperationError,
  NotADirectoryError,
  isNotExist,
  remoteStatus,
  wrapRemote,
} from "../errors";
import type { DriveNode, NodePage, NodePatch, RemoteNodeStore } from "../drive/types";
import { isDirectoryNode } from "../drive/types";
import type { FsLogger } from "../logger";
import { FileInfo } from "./fileInfo";
import { baseName, isWithin, joinPath, normalizePath, parentPath, splitPath } from "./path";
import type { RootScope } from "./rootScope";

export interface TrashEntry {
  node: DriveNode;
  /** Root-relative path the node had when it was trashed. */
  path: string;
}

export interface TreeOptions {
  trashForDelete: boolean;
}

const TRASH_PAGE_SIZE = 100;

export class DirectoryTree {
  constructor(
    private readonly store: RemoteNodeStore,
    private readonly scope: RootScope,
    private readonly logger: FsLogger,
    private readonly options: TreeOptions
  ) {}

  async mkdirAll(path: string): Promise<DriveNode> {
    let current = await this.scope.rootNode();
    let prefix = "";

    for (const segment of splitPath(path)) {
      const next = joinPath(prefix, segment);
      let node = await this.scope.lookup(next);
      if (!node) {
        node = await this.createDirectory(current, segment, next);
      }
      if (!isDirectoryNode(node)) {
        throw new NotADirectoryError(next);
      }
      current = node;
      prefix = next;
    }

    return current;
  }

  async mkdir(path: string): Promise<DriveNode> {
    const target = normalizePath(path);
    if (target === "") return this.scope.rootNode();

    const existing = await this.scope.lookup(target);
    if (existing) {
      if (!isDirectoryNode(existing)) throw new NotADirectoryError(target);
      return existing;
    }

    const parent = await this.requireDirectory(parentPath(target));
    return this.createDirectory(parent, baseName(target), target);
  }

  async stat(path: string): Promise<FileInfo> {
    const target = normalizePath(path);
    const node = await this.scope.resolve(target);
    return new FileInfo(node, target);
  }

  async listPage(directory: DriveNode, path: string, pageToken?: string, pageSize?: number): Promise<NodePage> {
    try {
      return await this.store.listChildren(directory.id, { pageToken, pageSize });
    } catch (err) {
      throw wrapRemote("readdir", path, err);
    }
  }

  /**
   * Create an empty file. The parent must already exist.
   */
  async createFile(path: string): Promise<DriveNode> {
    const target = normalizePath(path);
    const parent = await this.requireDirectory(parentPath(target));
    let node: DriveNode;
    try {
      node = await this.store.createNode({ name: baseName(target), parentId: parent.id, kind: "file" });
    } catch (err) {
      throw wrapRemote("create", target, err);
    }
    this.scope.remember(target, node);
    return node;
  }

  /**
   * Rename and/or move with a single metadata patch.
   */
  async rename(oldPath: string, newPath: string): Promise<DriveNode> {
    const from = normalizePath(oldPath);
    const to = normalizePath(newPath);
    if (from === "") throw new ForbiddenRootOperationError();
    if (to === "") throw new EmptyPathError();

    const node = await this.scope.resolve(from);
    if (from === to) return node;
    if (isWithin(to, from)) {
      throw new DriveFsError(`cannot move ${from} into itself`, "INVALID_MOVE", { from, to });
    }

    const oldParent = await this.scope.resolve(parentPath(from));
    const newParent = await this.requireDirectory(parentPath(to));

    const existing = await this.scope.lookup(to);
    if (existing && existing.id !== node.id) {
      if (isDirectoryNode(existing)) throw new FileExistsError(to);
      await this.discard(existing, to);
    }

    const patch: NodePatch = {};
    if (baseName(to) !== node.name) patch.name = baseName(to);
    if (oldParent.id !== newParent.id) {
      patch.addParents = [newParent.id];
      patch.removeParents = [oldParent.id];
    }

    let moved: DriveNode;
    try {
      moved = await this.store.patchNode(node.id, patch);
    } catch (err) {
      throw wrapRemote("rename", from, err);
    }

    this.scope.evict(from);
    this.scope.evict(to);
    this.scope.remember(to, moved);
    this.logger.debug("Renamed", { from, to, id: moved.id });
    return moved;
  }

  /** Trash or delete, depending on trashForDelete. */
  async remove(path: string): Promise<void> {
    const target = normalizePath(path);
    if (target === "") throw new ForbiddenRootOperationError();
    const node = await this.scope.resolve(target);
    await this.discard(node, target);
  }

  async deleteDirectory(path: string): Promise<void> {
    const target = normalizePath(path);
    if (target === "") throw new ForbiddenRootOperationError();
    const node = await this.scope.resolve(target);
    if (!isDirectoryNode(node)) throw new NotADirectoryError(target);
    await this.discard(node, target);
  }

  /** remove(), but a missing path is not an error. */
  async removeAll(path: string): Promise<void> {
    try {
      await this.remove(path);
    } catch (err) {
      if (isNotExist(err)) return;
      throw err;
    }
  }

  async trashPath(path: string): Promise<DriveNode> {
    const target = normalizePath(path);
    if (target === "") throw new ForbiddenRootOperationError();
    const node = await this.scope.resolve(target);
    return this.trash(node, target);
  }

  /**
   * Trashed nodes under the active root, and under `scopePath` when it is not empty.
   * A limit of 0 or less means no limit.
   */
  async listTrash(scopePath: string, limit: number): Promise<TrashEntry[]> {
    const scope = normalizePath(scopePath);
    if (scope !== "") await this.scope.resolve(scope);

    const entries: TrashEntry[] = [];
    let pageToken: string | undefined;

    do {
      let page: NodePage;
      try {
        page = await this.store.listTrashed({ pageToken, pageSize: TRASH_PAGE_SIZE });
      } catch (err) {
        throw wrapRemote("listTrash", scope, err);
      }

      for (const node of page.nodes) {
        const membership = await this.scope.isInRoot(node);
        if (!membership.inRoot) continue;
        const path = joinPath(membership.parentPath, node.name);
        if (!isWithin(membership.parentPath, scope)) continue;
        entries.push({ node, path });
        if (limit > 0 && entries.length >= limit) return entries;
      }

      pageToken = page.nextPageToken;
    } while (pageToken);

    return entries;
  }

  /** Clear the trashed flag. Parent links are left as they are. */
  async restore(entry: TrashEntry): Promise<DriveNode> {
    let node: DriveNode;
    try {
      node = await this.store.patchNode(entry.node.id, { trashed: false });
    } catch (err) {
      throw wrapRemote("restore", entry.path, err);
    }
    this.scope.evict(entry.path);
    return node;
  }

  async touch(path: string, accessedTime: Date, modifiedTime: Date): Promise<DriveNode> {
    const target = normalizePath(path);
    const node = await this.scope.resolve(target);
    let patched: DriveNode;
    try {
      patched = await this.store.patchNode(node.id, { accessedTime, modifiedTime });
    } catch (err) {
      throw wrapRemote("chtimes", target, err);
    }
    if (target !== "") this.scope.remember(target, patched);
    return patched;
  }

  /** Record a fresh snapshot for `path` after a content update. */
  remember(path: string, node: DriveNode): void {
    if (path !== "") this.scope.remember(path, node);
  }

  private async requireDirectory(path: string): Promise<DriveNode> {
    let node: DriveNode;
    try {
      node = await this.scope.resolve(path);
    } catch (err) {
      if (isNotExist(err)) throw new FileNotExistError(path);
      throw err;
    }
    if (!isDirectoryNode(node)) throw new NotADirectoryError(path);
    return node;
  }

  private async createDirectory(parent: DriveNode, name: string, path: string): Promise<DriveNode> {
    let node: DriveNode;
    try {
      node = await this.store.createNode({ name, parentId: parent.id, kind: "directory" });
    } catch (err) {
      // created concurrently by someone else
      if (remoteStatus(err) === 409) {
        this.logger.debug("Directory already exists, re-resolving", { path });
        return this.scope.resolve(path);
      }
      throw wrapRemote("mkdir", path, err);
    }
    this.scope.remember(path, node);
    return node;
  }

  private async discard(node: DriveNode, path: string): Promise<void> {
    if (this.options.trashForDelete) {
      await this.trash(node, path);
      return;
    }
    try {
      await this.store.deleteNode(node.id);
    } catch (err) {
      throw wrapRemote("remove", path, err);
    }
    this.scope.evict(path);
  }

  private async trash(node: DriveNode, path: string): Promise<DriveNode> {
    let trashed: DriveNode;
    try {
      trashed = await this.store.patchNode(node.id, { trashed: true });
    } catch (err) {
      throw wrapRemote("trash", path, err);
    }
    this.scope.evict(path);
    return trashed;
  }
}
