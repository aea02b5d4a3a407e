/**
 * DriveFs - path-addressed filesystem over a RemoteNodeStore
 *
 * All paths are relative to the active root. Argument checks run before any
 * remote call. Every public operation publishes an FsOperationEvent when an
 * EventBus is configured.
 */

import { DriveFsConfig, DriveFsOptions, parseDriveFsConfig, parseWriteBufferConfig } from "../config";
import type { DriveNode, RemoteNodeStore } from "../drive/types";
import {
  EmptyPathError,
  FileExistsError,
  FileNotExistError,
  IsADirectoryError,
  UnsupportedError,
} from "../errors";
import type { EventBus } from "../eventBus";
import { DriveFsLogger, FsLogger } from "../logger";
import { FileHandle, HandleContext } from "./fileHandle";
import { FileInfo } from "./fileInfo";
import { NodeCacheStats } from "./nodeCache";
import { normalizePath, parentPath } from "./path";
import { RootMembership, RootScope } from "./rootScope";
import { DirectoryTree, TrashEntry } from "./tree";
import { WriteBufferOptions } from "./writeBuffer";

// open flags, with the usual Linux values
export const O_RDONLY = 0x0;
export const O_WRONLY = 0x1;
export const O_RDWR = 0x2;
export const O_CREATE = 0x40;
export const O_EXCL = 0x80;
export const O_TRUNC = 0x200;
export const O_APPEND = 0x400;

const ACCESS_MASK = 0x3;

export interface WriteFileOptions {
  writeBuffer?: Partial<WriteBufferOptions>;
}

export class DriveFs {
  readonly logger: FsLogger;
  readonly eventBus?: EventBus;
  private readonly config: DriveFsConfig;
  private readonly scope: RootScope;
  private readonly tree: DirectoryTree;

  constructor(
    private readonly store: RemoteNodeStore,
    options: DriveFsOptions = {}
  ) {
    const { logger, eventBus, ...rest } = options;
    this.config = parseDriveFsConfig(rest);
    this.logger = logger ?? DriveFsLogger.silent();
    this.eventBus = eventBus;
    this.scope = new RootScope(store, this.logger, eventBus);
    this.tree = new DirectoryTree(store, this.scope, this.logger, {
      trashForDelete: this.config.trashForDelete,
    });
  }

  /**
   * Build a DriveFs and apply the configured root.
   */
  static async create(store: RemoteNodeStore, options: DriveFsOptions = {}): Promise<DriveFs> {
    const fs = new DriveFs(store, options);
    if (fs.config.rootId !== undefined) {
      await fs.setRootById(fs.config.rootId);
    } else if (fs.config.root !== undefined) {
      await fs.setRootByPath(fs.config.root);
    }
    return fs;
  }

  get trashForDelete(): boolean {
    return this.config.trashForDelete;
  }

  get writeBufferOptions(): WriteBufferOptions {
    return { ...this.config.writeBuffer };
  }

  // --- root -------------------------------------------------------------

  async rootNode(): Promise<DriveNode> {
    return this.scope.rootNode();
  }

  async setRootByPath(path: string): Promise<DriveNode> {
    return this.run("setRoot", path, () => this.scope.setRootByPath(path));
  }

  async setRootById(id: string): Promise<DriveNode> {
    return this.run("setRoot", id, () => this.scope.setRootById(id));
  }

  async isInRoot(node: DriveNode): Promise<RootMembership> {
    return this.scope.isInRoot(node);
  }

  // --- open -------------------------------------------------------------

  /** Open for reading. "" opens the root directory. */
  async open(path: string): Promise<FileHandle> {
    return this.openFile(path, O_RDONLY);
  }

  async create(path: string): Promise<FileHandle> {
    return this.openFile(path, O_WRONLY | O_CREATE | O_TRUNC);
  }

  /**
   * @param _mode - accepted for compatibility; permission bits are not stored
   */
  async openFile(path: string, flags: number, _mode = 0o644, options: WriteFileOptions = {}): Promise<FileHandle> {
    const target = normalizePath(path);
    const access = flags & ACCESS_MASK;
    if (access === O_RDWR || flags & O_APPEND) throw new UnsupportedError("openFile");
    const write = access === O_WRONLY;
    if (write && target === "") throw new EmptyPathError();
    const writeBuffer = write ? parseWriteBufferConfig({ ...this.config.writeBuffer, ...options.writeBuffer }) : null;

    return this.run("open", target, async () => {
      let node = await this.scope.lookup(target);
      if (!node) {
        if (!write || !(flags & O_CREATE)) throw new FileNotExistError(target);
        await this.tree.mkdirAll(parentPath(target));
        node = await this.tree.createFile(target);
      } else if (flags & O_EXCL) {
        throw new FileExistsError(target);
      }

      if (!writeBuffer) return new FileHandle(this.handleContext(), target, node);
      if (node.kind === "directory") throw new IsADirectoryError(target);
      return new FileHandle(this.handleContext(), target, node, {
        writeBuffer,
        truncate: (flags & O_TRUNC) !== 0,
      });
    });
  }

  /**
   * Create or replace `path` with `data`, creating missing parents.
   */
  async writeFile(path: string, data: Buffer | Uint8Array | string, options: WriteFileOptions = {}): Promise<FileInfo> {
    const handle = await this.openFile(path, O_WRONLY | O_CREATE | O_TRUNC, 0o644, options);
    try {
      await handle.write(data);
    } finally {
      await handle.close();
    }
    return this.stat(handle.path);
  }

  async readFile(path: string): Promise<Buffer> {
    const handle = await this.open(path);
    try {
      return await handle.readAll();
    } finally {
      await handle.close();
    }
  }

  // --- tree -------------------------------------------------------------

  async mkdir(path: string, _mode = 0o755): Promise<FileInfo> {
    const target = normalizePath(path);
    return this.run("mkdir", target, async () => new FileInfo(await this.tree.mkdir(target), target));
  }

  async mkdirAll(path: string, _mode = 0o755): Promise<FileInfo> {
    const target = normalizePath(path);
    return this.run("mkdirAll", target, async () => new FileInfo(await this.tree.mkdirAll(target), target));
  }

  async stat(path: string): Promise<FileInfo> {
    return this.run("stat", normalizePath(path), () => this.tree.stat(path));
  }

  /** Open, list and close a directory in one call. */
  async readdir(path: string, limit = 0): Promise<FileInfo[]> {
    const handle = await this.open(path);
    try {
      return await handle.readdir(limit);
    } finally {
      await handle.close();
    }
  }

  async rename(oldPath: string, newPath: string): Promise<FileInfo> {
    const to = normalizePath(newPath);
    return this.run("rename", normalizePath(oldPath), async () => {
      const node = await this.tree.rename(oldPath, newPath);
      return new FileInfo(node, to);
    });
  }

  async remove(path: string): Promise<void> {
    return this.run("remove", normalizePath(path), () => this.tree.remove(path));
  }

  async removeAll(path: string): Promise<void> {
    return this.run("removeAll", normalizePath(path), () => this.tree.removeAll(path));
  }

  async deleteDirectory(path: string): Promise<void> {
    return this.run("deleteDirectory", normalizePath(path), () => this.tree.deleteDirectory(path));
  }

  // --- trash ------------------------------------------------------------

  async trashPath(path: string): Promise<DriveNode> {
    return this.run("trash", normalizePath(path), () => this.tree.trashPath(path));
  }

  async listTrash(scopePath = "", limit = 0): Promise<TrashEntry[]> {
    return this.run("listTrash", normalizePath(scopePath), () => this.tree.listTrash(scopePath, limit));
  }

  async restore(entry: TrashEntry): Promise<DriveNode> {
    return this.run("restore", entry.path, () => this.tree.restore(entry));
  }

  // --- attributes -------------------------------------------------------

  /** Permission bits are not stored; the path only has to exist. */
  async chmod(path: string, _mode: number): Promise<void> {
    const target = normalizePath(path);
    await this.run("chmod", target, () => this.scope.resolve(target));
  }

  async chtimes(path: string, accessedTime: Date, modifiedTime: Date): Promise<void> {
    const target = normalizePath(path);
    await this.run("chtimes", target, () => this.tree.touch(target, accessedTime, modifiedTime));
  }

  async chown(_path: string, _uid: number, _gid: number): Promise<void> {
    throw new UnsupportedError("chown");
  }

  async truncate(_path: string, _size: number): Promise<void> {
    throw new UnsupportedError("truncate");
  }

  cacheStats(): NodeCacheStats {
    return this.scope.cache.stats();
  }

  private handleContext(): HandleContext {
    return { store: this.store, tree: this.tree, logger: this.logger, eventBus: this.eventBus };
  }

  private async run<T>(operation: string, path: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.eventBus?.emit("FsOperationEvent", { operation, path, durationMs: Date.now() - start, ok: true });
      return result;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.debug("Operation failed", { operation, path, error: message });
      this.eventBus?.emit("FsOperationEvent", {
        operation,
        path,
        durationMs: Date.now() - start,
        ok: false,
        error: message,
      });
      throw err;
    }
  }
}

export { FileHandle, SEEK_CUR, SEEK_END, SEEK_SET } from "./fileHandle";
export type { SeekWhence } from "./fileHandle";
export { FileInfo, S_IFDIR } from "./fileInfo";
export type { RootMembership } from "./rootScope";
export type { TrashEntry } from "./tree";
export { normalizePath } from "./path";
