/**
 * drivefs - path-addressed filesystem over Google Drive
 */

export {
  DriveFs,
  FileHandle,
  FileInfo,
  O_APPEND,
  O_CREATE,
  O_EXCL,
  O_RDONLY,
  O_RDWR,
  O_TRUNC,
  O_WRONLY,
  S_IFDIR,
  SEEK_CUR,
  SEEK_END,
  SEEK_SET,
  normalizePath,
} from "./core/fs";
export type { RootMembership, SeekWhence, TrashEntry, WriteFileOptions } from "./core/fs";
export { DEFAULT_BUFFER_SIZE, DEFAULT_QUEUE_DEPTH } from "./core/fs/writeBuffer";
export type { WriteBufferOptions } from "./core/fs/writeBuffer";

export { DriveClient, DRIVE_API_URL, DRIVE_UPLOAD_URL, escapeQueryValue } from "./core/drive/client";
export { MemoryNodeStore } from "./core/drive/memoryStore";
export { createBearerTransport } from "./core/drive/transport";
export type { AccessTokenSource, DriveTransport, TransportRequest, TransportResponse } from "./core/drive/transport";
export { FOLDER_MIME_TYPE } from "./core/drive/types";
export type { DriveNode, NodeKind, NodePage, NodePatch, RemoteNodeStore } from "./core/drive/types";

export {
  ConfigError,
  DriveFsConfigSchema,
  WriteBufferConfigSchema,
  parseDriveFsConfig,
} from "./core/config";
export type { DriveFsConfig, DriveFsOptions } from "./core/config";

export * from "./core/errors";
export { EventBus } from "./core/eventBus";
export type { EventEnvelope, EventType, FsEventMap, WriteBufferStrategyName } from "./core/eventBus";
export { DriveFsLogger, createLogger } from "./core/logger";
export type { FsLogger, LoggerConfig } from "./core/logger";

export {
  OAuthTokenSchema,
  TokenError,
  decodeTokenBase64,
  encodeTokenBase64,
  loadTokenFromFile,
  storeTokenToFile,
} from "./core/auth/tokenStore";
export type { OAuthToken } from "./core/auth/tokenStore";
