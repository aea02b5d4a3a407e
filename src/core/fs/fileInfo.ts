import type { DriveNode } from "../drive/types";
import { isDirectoryNode } from "../drive/types";

export const S_IFDIR = 0o040000;

const DIRECTORY_MODE = 0o755 | S_IFDIR;
const FILE_MODE = 0o644;

/**
 * Stat result. Mode bits are informational; nothing enforces them.
 */
export class FileInfo {
  constructor(
    readonly node: DriveNode,
    /** Root-relative path, "" for the root itself. */
    readonly path: string
  ) {}

  get name(): string {
    return this.node.name;
  }

  get id(): string {
    return this.node.id;
  }

  get size(): number {
    return this.node.size;
  }

  get mode(): number {
    return isDirectoryNode(this.node) ? DIRECTORY_MODE : FILE_MODE;
  }

  get modifiedTime(): Date {
    return this.node.modifiedTime;
  }

  get accessedTime(): Date | undefined {
    return this.node.accessedTime;
  }

  isDirectory(): boolean {
    return isDirectoryNode(this.node);
  }

  isFile(): boolean {
    return !isDirectoryNode(this.node);
  }
}
