/**
 * DriveFs facade: open flags, handles, content round-trips
 */

import { ConfigError } from "../src/core/config";
import { RemoteStatusError } from "../src/core/errors";
import { EventBus, WriteBufferStrategyName } from "../src/core/eventBus";
import {
  O_APPEND,
  O_CREATE,
  O_EXCL,
  O_RDONLY,
  O_RDWR,
  O_TRUNC,
  O_WRONLY,
  SEEK_CUR,
  SEEK_END,
  SEEK_SET,
} from "../src/core/fs";
import { pattern, readText, setup, writeText } from "./helpers";

describe("openFile", () => {
  test("missing path without create fails with the full path and creates nothing", async () => {
    const { fs, store } = setup();

    await expect(fs.openFile("Folder1/File1", O_RDONLY)).rejects.toThrow("`Folder1/File1' does not exist");
    await expect(fs.openFile("Folder1/File1", O_RDONLY | O_CREATE)).rejects.toThrow("`Folder1/File1' does not exist");
    expect(store.callCount("createNode")).toBe(0);
  });

  test("write + create makes the parents and the file", async () => {
    const { fs } = setup();

    const handle = await fs.openFile("Folder1/Sub/File1", O_WRONLY | O_CREATE);
    await handle.writeString("Hello World");
    await handle.close();

    expect((await fs.stat("Folder1/Sub")).isDirectory()).toBe(true);
    expect(await readText(fs, "Folder1/Sub/File1")).toBe("Hello World");
  });

  test("argument errors happen before any remote call", async () => {
    const { fs, store } = setup();

    await expect(fs.openFile("", O_WRONLY | O_CREATE)).rejects.toThrow("path cannot be empty");
    await expect(fs.openFile("a", O_RDWR)).rejects.toThrow("not supported");
    await expect(fs.openFile("a", O_WRONLY | O_APPEND)).rejects.toThrow("not supported");
    await expect(fs.chown("a", 0, 0)).rejects.toThrow("not supported");
    await expect(fs.truncate("a", 0)).rejects.toThrow("not supported");
    expect(store.calls).toEqual([]);
  });

  test("write buffer overrides are validated before any remote call", async () => {
    const { fs, store } = setup({ writeBuffer: { strategy: "simple" } });

    await expect(
      fs.writeFile("File1", "abc", { writeBuffer: { strategy: "boundedQueue", queueDepth: 0 } })
    ).rejects.toThrow(ConfigError);
    await expect(fs.writeFile("File1", "abc", { writeBuffer: { bufferSize: 0 } })).rejects.toThrow(
      "Invalid write buffer options: bufferSize"
    );
    await expect(
      fs.openFile("File1", O_WRONLY | O_CREATE, 0o644, { writeBuffer: { bufferSize: -4 } })
    ).rejects.toThrow("Invalid write buffer options: bufferSize");
    expect(store.calls).toEqual([]);
  });

  test("read-only opens ignore write buffer overrides", async () => {
    const { fs } = setup();
    await writeText(fs, "File1", "abc");

    const handle = await fs.openFile("File1", O_RDONLY, 0o644, { writeBuffer: { queueDepth: 0 } });

    expect((await handle.readAll()).toString()).toBe("abc");
    await handle.close();
  });

  test("O_EXCL refuses an existing path", async () => {
    const { fs } = setup();
    await writeText(fs, "File1");
    await expect(fs.openFile("File1", O_WRONLY | O_CREATE | O_EXCL)).rejects.toThrow("file File1 already exists");
  });

  test("writing to a directory fails", async () => {
    const { fs } = setup();
    await fs.mkdir("Dir");
    await expect(fs.openFile("Dir", O_WRONLY)).rejects.toThrow("file Dir is a directory");
    await expect(fs.writeFile("Dir", "x")).rejects.toThrow("file Dir is a directory");
  });

  test("open('') is the root directory", async () => {
    const { fs } = setup();
    await fs.mkdir("a");
    const root = await fs.open("");

    expect(root.stat().isDirectory()).toBe(true);
    expect(await root.readdirnames(0)).toEqual(["a"]);
    await root.close();
  });
});

describe("file handles", () => {
  test("read, seek and readAt", async () => {
    const { fs } = setup();
    await writeText(fs, "Folder1/File1", "Hello World");
    const f = await fs.openFile("Folder1/File1", O_RDONLY);

    expect((await f.readAll()).toString()).toBe("Hello World");
    expect(await f.seek(6, SEEK_SET)).toBe(6);
    expect((await f.readAll()).toString()).toBe("World");

    await f.seek(0, SEEK_SET);
    expect((await f.read(5)).toString()).toBe("Hello");
    expect(await f.seek(1, SEEK_CUR)).toBe(6);
    expect((await f.readAt(3, 0)).toString()).toBe("Hel");
    expect((await f.read(100)).toString()).toBe("World");
    expect((await f.read(1)).length).toBe(0);
    expect(await f.seek(-5, SEEK_END)).toBe(6);
    await expect(f.seek(-1, SEEK_SET)).rejects.toThrow("negative position -1");
    await f.close();
  });

  test("reading is only for read handles and writing only for write handles", async () => {
    const { fs } = setup();
    await writeText(fs, "File1");

    const reader = await fs.open("File1");
    await expect(reader.write("x")).rejects.toThrow("file File1 is not open for writing");
    await reader.close();

    const writer = await fs.create("File1");
    await expect(writer.read(1)).rejects.toThrow("file File1 is not open for reading");
    await writer.close();
  });

  test("a second close fails", async () => {
    const { fs } = setup();
    await writeText(fs, "File1");
    const f = await fs.open("File1");

    await f.close();

    await expect(f.close()).rejects.toThrow("file already closed");
    await expect(f.read(1)).rejects.toThrow("file already closed");
  });

  test("handle truncate is unsupported and sync is a no-op", async () => {
    const { fs } = setup();
    const f = await fs.create("File1");
    await expect(f.truncate(0)).rejects.toThrow("not supported");
    await expect(f.sync()).resolves.toBeUndefined();
    await f.close();
  });

  test("content is replaced on close, not before", async () => {
    const { fs, store } = setup();
    await writeText(fs, "File1", "old");
    const id = (await fs.stat("File1")).id;

    const f = await fs.create("File1");
    await f.write("new content");
    expect(store.peekContent(id)).not.toBe("new content");
    await f.close();

    expect(store.peekContent(id)).toBe("new content");
    expect((await fs.stat("File1")).size).toBe(11);
  });

  test("O_TRUNC empties a file even without writes", async () => {
    const { fs } = setup();
    await writeText(fs, "File1", "something");

    await (await fs.create("File1")).close();

    expect(await readText(fs, "File1")).toBe("");
  });

  test("upload failures surface on close wrapped with the path", async () => {
    const eventBus = new EventBus();
    const { fs, store } = setup({ eventBus });
    store.injectFault("writeContent", new RemoteStatusError("quota exceeded", 403));

    const f = await fs.create("f");
    const nodeId = f.stat().id;
    await f.write("abc");

    await expect(f.close()).rejects.toThrow("write f: quota exceeded");
    const uploads = eventBus.getHistory({ type: "UploadEvent" });
    expect(uploads.map((e) => e.payload)).toEqual([
      { path: "f", nodeId, strategy: "none", bytes: 3, ok: false, error: "write f: quota exceeded" },
    ]);
  });
});

describe("content round-trip", () => {
  const strategies: WriteBufferStrategyName[] = ["none", "simple", "async", "boundedQueue"];
  const big = pattern(4096 * 3 + 15);

  test.each(strategies)("%s with a buffer smaller than the content", async (strategy) => {
    const { fs } = setup({ writeBuffer: { strategy, bufferSize: 1024, queueDepth: 2 } });

    const f = await fs.create("Folder1/File1");
    for (let offset = 0; offset < big.length; offset += 1000) {
      await f.write(big.subarray(offset, offset + 1000));
    }
    await f.close();

    expect((await fs.readFile("Folder1/File1")).equals(big)).toBe(true);
  });

  test.each(strategies)("%s with a buffer larger than the content", async (strategy) => {
    const { fs } = setup();

    await fs.writeFile("File1", big, { writeBuffer: { strategy, bufferSize: 1024 * 1024 } });

    expect((await fs.readFile("File1")).equals(big)).toBe(true);
  });

  test.each(strategies)("%s with a single small write", async (strategy) => {
    const { fs } = setup({ writeBuffer: { strategy, bufferSize: 4 } });
    await fs.writeFile("File1", "Hello World");
    expect(await readText(fs, "File1")).toBe("Hello World");
  });

  test("one upload per handle", async () => {
    const { fs, store } = setup({ writeBuffer: { strategy: "simple", bufferSize: 2 } });
    const f = await fs.create("File1");
    for (const part of ["ab", "cd", "e"]) await f.write(part);
    await f.close();

    expect(store.callCount("writeContent")).toBe(1);
    expect(await readText(fs, "File1")).toBe("abcde");
  });
});

describe("concurrent callers", () => {
  test("parallel writes on two handles keep their own content", async () => {
    const { fs, store } = setup({ writeBuffer: { strategy: "async", bufferSize: 64 } });
    const one = pattern(1000, 1);
    const two = pattern(1000, 2);

    const [a, b] = await Promise.all([fs.create("Folder1/one"), fs.create("Folder2/two")]);
    for (let offset = 0; offset < 1000; offset += 100) {
      await Promise.all([a.write(one.subarray(offset, offset + 100)), b.write(two.subarray(offset, offset + 100))]);
    }
    await Promise.all([a.close(), b.close()]);

    expect((await fs.readFile("Folder1/one")).equals(one)).toBe(true);
    expect((await fs.readFile("Folder2/two")).equals(two)).toBe(true);
    expect(store.callCount("writeContent")).toBe(2);
  });
});

describe("attributes", () => {
  test("chmod checks existence only", async () => {
    const { fs, store } = setup();
    await writeText(fs, "File1");
    const patches = store.callCount("patchNode");

    await fs.chmod("File1", 0o755);

    expect(store.callCount("patchNode")).toBe(patches);
    await expect(fs.chmod("missing", 0o755)).rejects.toThrow("`missing' does not exist");
  });

  test("chtimes sets modify and access times", async () => {
    const { fs } = setup();
    await writeText(fs, "File1");
    const atime = new Date("2020-11-27T00:00:00Z");
    const mtime = new Date("2020-02-26T00:00:00Z");

    await fs.chtimes("File1", atime, mtime);

    const info = await fs.stat("File1");
    expect(info.modifiedTime).toEqual(mtime);
    expect(info.accessedTime).toEqual(atime);
  });
});

describe("observability", () => {
  test("operations are published on the event bus", async () => {
    const eventBus = new EventBus();
    const { fs } = setup({ eventBus });
    await fs.mkdir("a");
    await expect(fs.stat("missing")).rejects.toThrow();

    const ops = eventBus.getHistory({ type: "FsOperationEvent" }).map((e) => e.payload);
    expect(ops.map((o) => [o.operation, o.path, o.ok])).toEqual([
      ["mkdir", "a", true],
      ["stat", "missing", false],
    ]);
    expect(ops[1]?.error).toBe("`missing' does not exist");
  });

  test("cache statistics are exposed", async () => {
    const { fs } = setup();
    await fs.mkdirAll("a/b");
    await fs.stat("a/b");
    expect(fs.cacheStats().size).toBe(2);
    expect(fs.cacheStats().hits).toBeGreaterThan(0);
  });
});
