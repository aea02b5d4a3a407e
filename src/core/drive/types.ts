/**
 * Remote node model
 *
 * The backend stores flat nodes linked by parent ids. Nothing here knows about paths.
 */

import type { Readable } from "stream";

export const FOLDER_MIME_TYPE = "application/vnd.google-apps.folder";

export type NodeKind = "file" | "directory";

export interface DriveNode {
  readonly id: string;
  readonly name: string;
  /** The backend may record several parents; order is the backend's. */
  readonly parents: readonly string[];
  readonly kind: NodeKind;
  readonly size: number;
  readonly modifiedTime: Date;
  readonly accessedTime?: Date;
  readonly trashed: boolean;
}

export interface NodePage {
  nodes: DriveNode[];
  nextPageToken?: string;
}

export interface PageOptions {
  pageToken?: string;
  pageSize?: number;
}

export interface CreateNodeInput {
  name: string;
  parentId: string;
  kind: NodeKind;
  modifiedTime?: Date;
}

/**
 * A single metadata patch. Applied atomically by the backend.
 */
export interface NodePatch {
  name?: string;
  addParents?: string[];
  removeParents?: string[];
  trashed?: boolean;
  modifiedTime?: Date;
  accessedTime?: Date;
}

/**
 * The backend calls the filesystem layer needs.
 */
export interface RemoteNodeStore {
  /** The backend's absolute top ("My Drive"). */
  getTop(): Promise<DriveNode>;
  getNode(id: string): Promise<DriveNode>;
  /** First non-trashed child of `parentId` named `name`, in backend order. */
  findChild(parentId: string, name: string): Promise<DriveNode | null>;
  listChildren(parentId: string, options?: PageOptions): Promise<NodePage>;
  createNode(input: CreateNodeInput): Promise<DriveNode>;
  patchNode(id: string, patch: NodePatch): Promise<DriveNode>;
  /** Replace the node's content with everything read from `source`. */
  writeContent(id: string, source: Readable): Promise<DriveNode>;
  readContent(id: string): Promise<Buffer>;
  deleteNode(id: string): Promise<void>;
  listTrashed(options?: PageOptions): Promise<NodePage>;
}

export function isDirectoryNode(node: DriveNode): boolean {
  return node.kind === "directory";
}
