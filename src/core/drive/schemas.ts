/**
 * Zod schemas for Drive v3 REST payloads
 */

import { z } from "zod";
import { DriveNode, FOLDER_MIME_TYPE } from "./types";

export const NODE_FIELDS = "id,name,mimeType,parents,size,modifiedTime,viewedByMeTime,trashed";

export const DriveFileSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  mimeType: z.string().optional(),
  parents: z.array(z.string()).optional(),
  // int64 values arrive as strings
  size: z.string().regex(/^\d+$/).optional(),
  modifiedTime: z.string().optional(),
  viewedByMeTime: z.string().optional(),
  trashed: z.boolean().optional(),
});

export type DriveFile = z.infer<typeof DriveFileSchema>;

export const DriveFileListSchema = z.object({
  files: z.array(DriveFileSchema).default([]),
  nextPageToken: z.string().optional(),
});

export const DriveErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
    errors: z.array(z.object({ reason: z.string().optional() })).optional(),
  }),
});

export function toDriveNode(file: DriveFile): DriveNode {
  const node: DriveNode = {
    id: file.id,
    name: file.name,
    parents: Object.freeze([...(file.parents ?? [])]),
    kind: file.mimeType === FOLDER_MIME_TYPE ? "directory" : "file",
    size: file.size ? Number(file.size) : 0,
    modifiedTime: file.modifiedTime ? new Date(file.modifiedTime) : new Date(0),
    accessedTime: file.viewedByMeTime ? new Date(file.viewedByMeTime) : undefined,
    trashed: file.trashed ?? false,
  };
  return Object.freeze(node);
}
