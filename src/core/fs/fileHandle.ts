/**
 * Open file and directory handles.
 *
 * A handle binds one node to a cursor. Write handles own one write buffer and
 * one upload session; close() is where buffered content becomes durable.
 */

import type { EventBus } from "../eventBus";
import {
  DriveFsError,
  HandleClosedError,
  HandleModeError,
  IsADirectoryError,
  NotADirectoryError,
  UnsupportedError,
  wrapRemote,
} from "../errors";
import type { DriveNode, RemoteNodeStore } from "../drive/types";
import { isDirectoryNode } from "../drive/types";
import type { FsLogger } from "../logger";
import { FileInfo } from "./fileInfo";
import { joinPath } from "./path";
import type { DirectoryTree } from "./tree";
import { UploadSession, WriteBuffer, WriteBufferOptions, createWriteBuffer } from "./writeBuffer";

export const SEEK_SET = 0;
export const SEEK_CUR = 1;
export const SEEK_END = 2;

export type SeekWhence = typeof SEEK_SET | typeof SEEK_CUR | typeof SEEK_END;

export interface HandleContext {
  store: RemoteNodeStore;
  tree: DirectoryTree;
  logger: FsLogger;
  eventBus?: EventBus;
}

export interface WriteMode {
  writeBuffer: WriteBufferOptions;
  /** Replace existing content even when nothing is written. */
  truncate: boolean;
}

const LIST_PAGE_SIZE = 100;

export class FileHandle {
  private closed = false;
  private position = 0;
  private content: Buffer | null = null;

  // directory listing cursor
  private pageToken: string | undefined;
  private listed: DriveNode[] = [];
  private listingDone = false;

  private readonly buffer: WriteBuffer | null = null;
  private readonly session: UploadSession | null = null;

  constructor(
    private readonly ctx: HandleContext,
    readonly path: string,
    private node: DriveNode,
    private readonly writeMode?: WriteMode
  ) {
    if (writeMode) {
      this.session = new UploadSession(ctx.store, node.id, path);
      this.buffer = createWriteBuffer(writeMode.writeBuffer, this.session);
    }
  }

  get name(): string {
    return this.node.name;
  }

  get writable(): boolean {
    return this.buffer !== null;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  stat(): FileInfo {
    this.ensureOpen();
    return new FileInfo(this.node, this.path);
  }

  /**
   * Read up to `length` bytes at the cursor. An empty buffer means end of file.
   */
  async read(length: number): Promise<Buffer> {
    const content = await this.loadContent();
    const chunk = content.subarray(this.position, this.position + Math.max(0, length));
    this.position += chunk.length;
    return Buffer.from(chunk);
  }

  /** Everything from the cursor to the end. */
  async readAll(): Promise<Buffer> {
    const content = await this.loadContent();
    const rest = content.subarray(Math.min(this.position, content.length));
    this.position = content.length;
    return Buffer.from(rest);
  }

  /** Read without moving the cursor. */
  async readAt(length: number, offset: number): Promise<Buffer> {
    if (offset < 0) {
      throw new DriveFsError(`negative offset ${offset}`, "INVALID_OFFSET", { path: this.path, offset });
    }
    const content = await this.loadContent();
    return Buffer.from(content.subarray(offset, offset + Math.max(0, length)));
  }

  async seek(offset: number, whence: SeekWhence = SEEK_SET): Promise<number> {
    this.ensureOpen();
    let base = 0;
    if (whence === SEEK_CUR) base = this.position;
    if (whence === SEEK_END) base = this.content ? this.content.length : this.node.size;
    const next = base + offset;
    if (next < 0) {
      throw new DriveFsError(`negative position ${next}`, "INVALID_OFFSET", { path: this.path, offset });
    }
    this.position = next;
    return next;
  }

  /**
   * Queue `data` into the handle's write buffer. Returns the byte count.
   */
  async write(data: Buffer | Uint8Array | string): Promise<number> {
    this.ensureOpen();
    if (!this.buffer) throw new HandleModeError(this.path, "writing");
    const chunk = typeof data === "string" ? Buffer.from(data, "utf8") : Buffer.from(data);
    await this.buffer.write(chunk);
    this.position += chunk.length;
    return chunk.length;
  }

  async writeString(value: string): Promise<number> {
    return this.write(value);
  }

  /**
   * List children in name order. A limit of 0 or less returns everything not
   * returned yet; an exhausted listing returns [].
   */
  async readdir(limit = 0): Promise<FileInfo[]> {
    this.ensureOpen();
    if (!isDirectoryNode(this.node)) throw new NotADirectoryError(this.path);

    const wanted = limit > 0 ? limit : Infinity;
    while (this.listed.length < wanted && !this.listingDone) {
      const page = await this.ctx.tree.listPage(
        this.node,
        this.path,
        this.pageToken,
        limit > 0 ? Math.max(limit, LIST_PAGE_SIZE) : LIST_PAGE_SIZE
      );
      this.listed.push(...page.nodes);
      this.pageToken = page.nextPageToken;
      this.listingDone = !page.nextPageToken;
    }

    const taken = limit > 0 ? this.listed.splice(0, limit) : this.listed.splice(0);
    return taken.map((child) => new FileInfo(child, joinPath(this.path, child.name)));
  }

  async readdirnames(limit = 0): Promise<string[]> {
    const entries = await this.readdir(limit);
    return entries.map((entry) => entry.name);
  }

  async truncate(_size: number): Promise<void> {
    throw new UnsupportedError("truncate");
  }

  /** Content is only durable once close() returns. */
  async sync(): Promise<void> {
    this.ensureOpen();
  }

  async close(): Promise<void> {
    this.ensureOpen();
    this.closed = true;
    this.content = null;
    if (!this.buffer || !this.session || !this.writeMode) return;

    const session = this.session;
    const strategy = this.buffer.kind;
    try {
      await this.buffer.close();
      const force = this.writeMode.truncate && this.node.size > 0;
      const updated = await session.finish(force);
      if (updated) this.node = updated;
    } catch (err) {
      const error = wrapRemote("write", this.path, err);
      this.ctx.eventBus?.emit("UploadEvent", {
        path: this.path,
        nodeId: this.node.id,
        strategy,
        bytes: session.bytesWritten,
        ok: false,
        error: error.message,
      });
      throw error;
    }

    if (session.started) {
      this.ctx.tree.remember(this.path, this.node);
      this.ctx.eventBus?.emit("UploadEvent", {
        path: this.path,
        nodeId: this.node.id,
        strategy,
        bytes: session.bytesWritten,
        ok: true,
      });
      this.ctx.logger.debug("Upload finished", { path: this.path, bytes: session.bytesWritten, strategy });
    }
  }

  private async loadContent(): Promise<Buffer> {
    this.ensureOpen();
    if (isDirectoryNode(this.node)) throw new IsADirectoryError(this.path);
    if (this.buffer) throw new HandleModeError(this.path, "reading");
    if (!this.content) {
      try {
        this.content = await this.ctx.store.readContent(this.node.id);
      } catch (err) {
        throw wrapRemote("read", this.path, err);
      }
    }
    return this.content;
  }

  private ensureOpen(): void {
    if (this.closed) throw new HandleClosedError(this.path);
  }
}
