/**
 * Error taxonomy for drivefs
 *
 * Messages are stable: callers and compatible implementations compare them verbatim.
 */

export class DriveFsError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "DriveFsError";
    Object.setPrototypeOf(this, DriveFsError.prototype);
  }
}

export class FileNotExistError extends DriveFsError {
  constructor(public path: string) {
    super(`\`${path}' does not exist`, "NOT_EXIST", { path });
    this.name = "FileNotExistError";
    Object.setPrototypeOf(this, FileNotExistError.prototype);
  }
}

export class NotADirectoryError extends DriveFsError {
  constructor(public path: string) {
    super(`file ${path} is not a directory`, "NOT_A_DIRECTORY", { path });
    this.name = "NotADirectoryError";
    Object.setPrototypeOf(this, NotADirectoryError.prototype);
  }
}

export class IsADirectoryError extends DriveFsError {
  constructor(public path: string) {
    super(`file ${path} is a directory`, "IS_A_DIRECTORY", { path });
    this.name = "IsADirectoryError";
    Object.setPrototypeOf(this, IsADirectoryError.prototype);
  }
}

export class FileExistsError extends DriveFsError {
  constructor(public path: string) {
    super(`file ${path} already exists`, "EXISTS", { path });
    this.name = "FileExistsError";
    Object.setPrototypeOf(this, FileExistsError.prototype);
  }
}

export class EmptyPathError extends DriveFsError {
  constructor() {
    super("path cannot be empty", "EMPTY_PATH");
    this.name = "EmptyPathError";
    Object.setPrototypeOf(this, EmptyPathError.prototype);
  }
}

export class ForbiddenRootOperationError extends DriveFsError {
  constructor() {
    super("forbidden for root directory", "FORBIDDEN_ROOT");
    this.name = "ForbiddenRootOperationError";
    Object.setPrototypeOf(this, ForbiddenRootOperationError.prototype);
  }
}

export class UnsupportedError extends DriveFsError {
  constructor(public operation?: string) {
    super("not supported", "UNSUPPORTED", operation ? { operation } : undefined);
    this.name = "UnsupportedError";
    Object.setPrototypeOf(this, UnsupportedError.prototype);
  }
}

export class HandleClosedError extends DriveFsError {
  constructor(public path: string) {
    super("file already closed", "HANDLE_CLOSED", { path });
    this.name = "HandleClosedError";
    Object.setPrototypeOf(this, HandleClosedError.prototype);
  }
}

export class HandleModeError extends DriveFsError {
  constructor(public path: string, public access: "reading" | "writing") {
    super(`file ${path} is not open for ${access}`, "HANDLE_MODE", { path, access });
    this.name = "HandleModeError";
    Object.setPrototypeOf(this, HandleModeError.prototype);
  }
}

/**
 * A failed call against the remote store, with the operation and path it was made for.
 */
export class RemoteOperationError extends DriveFsError {
  constructor(
    public operation: string,
    public path: string,
    public cause: unknown,
    public status?: number
  ) {
    super(
      `${operation} ${path}: ${describeCause(cause)}`,
      "REMOTE_ERROR",
      { operation, path, status }
    );
    this.name = "RemoteOperationError";
    Object.setPrototypeOf(this, RemoteOperationError.prototype);
  }
}

/**
 * Raised by a store when the backend answers with an HTTP error.
 */
export class RemoteStatusError extends DriveFsError {
  constructor(
    message: string,
    public status: number,
    public reason?: string
  ) {
    super(message, "REMOTE_STATUS", { status, reason });
    this.name = "RemoteStatusError";
    Object.setPrototypeOf(this, RemoteStatusError.prototype);
  }
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Wrap anything thrown by a store call. Taxonomy errors pass through untouched.
 */
export function wrapRemote(operation: string, path: string, err: unknown): DriveFsError {
  if (err instanceof DriveFsError && !(err instanceof RemoteStatusError)) {
    return err;
  }
  const status = err instanceof RemoteStatusError ? err.status : undefined;
  return new RemoteOperationError(operation, path, err, status);
}

export function remoteStatus(err: unknown): number | undefined {
  if (err instanceof RemoteStatusError) return err.status;
  if (err instanceof RemoteOperationError) return err.status;
  return undefined;
}

export function isNotExist(err: unknown): err is FileNotExistError {
  return err instanceof FileNotExistError;
}

export function isNotADirectory(err: unknown): err is NotADirectoryError {
  return err instanceof NotADirectoryError;
}

export function isUnsupported(err: unknown): err is UnsupportedError {
  return err instanceof UnsupportedError;
}
