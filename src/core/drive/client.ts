/**
 * Drive v3 REST client implementing RemoteNodeStore
 */

import type { Readable } from "stream";
import { z } from "zod";
import { RemoteStatusError } from "../errors";
import {
  DriveErrorSchema,
  DriveFileListSchema,
  DriveFileSchema,
  NODE_FIELDS,
  toDriveNode,
} from "./schemas";
import type { DriveTransport, HttpMethod, TransportResponse } from "./transport";
import {
  CreateNodeInput,
  DriveNode,
  FOLDER_MIME_TYPE,
  NodePage,
  NodePatch,
  PageOptions,
  RemoteNodeStore,
} from "./types";

export const DRIVE_API_URL = "https://www.googleapis.com/drive/v3";
export const DRIVE_UPLOAD_URL = "https://www.googleapis.com/upload/drive/v3";

const DEFAULT_PAGE_SIZE = 100;
const LIST_FIELDS = `nextPageToken,files(${NODE_FIELDS})`;

export interface DriveClientOptions {
  apiUrl?: string;
  uploadUrl?: string;
}

/** Escape a value for use inside a single-quoted Drive query literal. */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/'/g, "\\'");
}

export class DriveClient implements RemoteNodeStore {
  private readonly apiUrl: string;
  private readonly uploadUrl: string;

  constructor(private readonly transport: DriveTransport, options: DriveClientOptions = {}) {
    this.apiUrl = options.apiUrl ?? DRIVE_API_URL;
    this.uploadUrl = options.uploadUrl ?? DRIVE_UPLOAD_URL;
  }

  async getTop(): Promise<DriveNode> {
    return this.getNode("root");
  }

  async getNode(id: string): Promise<DriveNode> {
    const file = await this.call(
      "GET",
      this.url(`/files/${encodeURIComponent(id)}`, { fields: NODE_FIELDS }),
      DriveFileSchema
    );
    return toDriveNode(file);
  }

  async findChild(parentId: string, name: string): Promise<DriveNode | null> {
    const q = `'${escapeQueryValue(parentId)}' in parents and name = '${escapeQueryValue(name)}' and trashed = false`;
    const list = await this.call(
      "GET",
      this.url("/files", { q, fields: LIST_FIELDS, pageSize: "10" }),
      DriveFileListSchema
    );
    const first = list.files[0];
    return first ? toDriveNode(first) : null;
  }

  async listChildren(parentId: string, options: PageOptions = {}): Promise<NodePage> {
    const q = `'${escapeQueryValue(parentId)}' in parents and trashed = false`;
    return this.list(q, options);
  }

  async listTrashed(options: PageOptions = {}): Promise<NodePage> {
    return this.list("trashed = true", options);
  }

  async createNode(input: CreateNodeInput): Promise<DriveNode> {
    const body: Record<string, unknown> = {
      name: input.name,
      parents: [input.parentId],
    };
    if (input.kind === "directory") body.mimeType = FOLDER_MIME_TYPE;
    if (input.modifiedTime) body.modifiedTime = input.modifiedTime.toISOString();

    const file = await this.call(
      "POST",
      this.url("/files", { fields: NODE_FIELDS }),
      DriveFileSchema,
      JSON.stringify(body),
      { "Content-Type": "application/json" }
    );
    return toDriveNode(file);
  }

  async patchNode(id: string, patch: NodePatch): Promise<DriveNode> {
    const params: Record<string, string> = { fields: NODE_FIELDS };
    if (patch.addParents?.length) params.addParents = patch.addParents.join(",");
    if (patch.removeParents?.length) params.removeParents = patch.removeParents.join(",");

    const body: Record<string, unknown> = {};
    if (patch.name !== undefined) body.name = patch.name;
    if (patch.trashed !== undefined) body.trashed = patch.trashed;
    if (patch.modifiedTime) body.modifiedTime = patch.modifiedTime.toISOString();
    if (patch.accessedTime) body.viewedByMeTime = patch.accessedTime.toISOString();

    const file = await this.call(
      "PATCH",
      this.url(`/files/${encodeURIComponent(id)}`, params),
      DriveFileSchema,
      JSON.stringify(body),
      { "Content-Type": "application/json" }
    );
    return toDriveNode(file);
  }

  async writeContent(id: string, source: Readable): Promise<DriveNode> {
    const file = await this.call(
      "PATCH",
      this.url(`/files/${encodeURIComponent(id)}`, { uploadType: "media", fields: NODE_FIELDS }, this.uploadUrl),
      DriveFileSchema,
      source,
      { "Content-Type": "application/octet-stream" }
    );
    return toDriveNode(file);
  }

  async readContent(id: string): Promise<Buffer> {
    const res = await this.transport({
      method: "GET",
      url: this.url(`/files/${encodeURIComponent(id)}`, { alt: "media" }),
    });
    await this.ensureOk(res);
    return res.buffer();
  }

  async deleteNode(id: string): Promise<void> {
    const res = await this.transport({
      method: "DELETE",
      url: this.url(`/files/${encodeURIComponent(id)}`, {}),
    });
    await this.ensureOk(res);
  }

  private async list(q: string, options: PageOptions): Promise<NodePage> {
    const params: Record<string, string> = {
      q,
      fields: LIST_FIELDS,
      orderBy: "name",
      pageSize: String(options.pageSize ?? DEFAULT_PAGE_SIZE),
    };
    if (options.pageToken) params.pageToken = options.pageToken;

    const list = await this.call("GET", this.url("/files", params), DriveFileListSchema);
    return {
      nodes: list.files.map(toDriveNode),
      nextPageToken: list.nextPageToken,
    };
  }

  private url(path: string, params: Record<string, string>, base: string = this.apiUrl): string {
    const query = new URLSearchParams(params).toString();
    return query ? `${base}${path}?${query}` : `${base}${path}`;
  }

  private async call<T extends z.ZodTypeAny>(
    method: HttpMethod,
    url: string,
    schema: T,
    body?: string | Readable,
    headers?: Record<string, string>
  ): Promise<z.output<T>> {
    const res = await this.transport({ method, url, body, headers });
    await this.ensureOk(res);
    const text = await res.text();
    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch {
      throw new RemoteStatusError(`invalid JSON in ${method} response`, res.status);
    }
    return schema.parse(json);
  }

  private async ensureOk(res: TransportResponse): Promise<void> {
    if (res.status < 400) return;

    const text = await res.text();
    let message = `HTTP ${res.status}`;
    let reason: string | undefined;
    try {
      const parsed = DriveErrorSchema.safeParse(JSON.parse(text));
      if (parsed.success) {
        message = parsed.data.error.message;
        reason = parsed.data.error.errors?.[0]?.reason;
      }
    } catch {
      if (text) message = `HTTP ${res.status}: ${text}`;
    }
    throw new RemoteStatusError(message, res.status, reason);
  }
}
