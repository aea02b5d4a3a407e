/**
 * Error taxonomy
 */

import {
  DriveFsError,
  EmptyPathError,
  FileNotExistError,
  ForbiddenRootOperationError,
  NotADirectoryError,
  RemoteOperationError,
  RemoteStatusError,
  UnsupportedError,
  isNotADirectory,
  isNotExist,
  isUnsupported,
  remoteStatus,
  wrapRemote,
} from "../src/core/errors";

describe("errors", () => {
  test("messages are verbatim", () => {
    expect(new FileNotExistError("Folder1/File1").message).toBe("`Folder1/File1' does not exist");
    expect(new NotADirectoryError("File1").message).toBe("file File1 is not a directory");
    expect(new EmptyPathError().message).toBe("path cannot be empty");
    expect(new ForbiddenRootOperationError().message).toBe("forbidden for root directory");
    expect(new UnsupportedError("chown").message).toBe("not supported");
  });

  test("instanceof works through the hierarchy", () => {
    const err = new NotADirectoryError("a");
    expect(err).toBeInstanceOf(NotADirectoryError);
    expect(err).toBeInstanceOf(DriveFsError);
    expect(err).toBeInstanceOf(Error);
    expect(err.code).toBe("NOT_A_DIRECTORY");
    expect(err.details).toEqual({ path: "a" });
  });

  test("type guards", () => {
    expect(isNotExist(new FileNotExistError("x"))).toBe(true);
    expect(isNotExist(new Error("x"))).toBe(false);
    expect(isNotADirectory(new NotADirectoryError("x"))).toBe(true);
    expect(isUnsupported(new UnsupportedError())).toBe(true);
  });

  describe("wrapRemote", () => {
    test("wraps HTTP failures with operation, path and status", () => {
      const wrapped = wrapRemote("rename", "a/b", new RemoteStatusError("rate limited", 429));
      expect(wrapped).toBeInstanceOf(RemoteOperationError);
      expect(wrapped.message).toBe("rename a/b: rate limited");
      expect(remoteStatus(wrapped)).toBe(429);
    });

    test("wraps plain errors without a status", () => {
      const wrapped = wrapRemote("read", "f", new Error("socket hang up"));
      expect(wrapped.message).toBe("read f: socket hang up");
      expect(remoteStatus(wrapped)).toBeUndefined();
    });

    test("passes taxonomy errors through", () => {
      const original = new FileNotExistError("a");
      expect(wrapRemote("stat", "a", original)).toBe(original);
    });
  });
});
