/**
 * drivefs CLI against an in-process store
 */

import fs from "fs";
import os from "os";
import path from "path";
import { createCli } from "../src/cli";
import { CONFIG_FILE_NAME, loadConfig } from "../src/cli/utils/loadConfig";
import { MemoryNodeStore } from "../src/core/drive/memoryStore";
import { ConfigError } from "../src/core/config";
import { DriveFsLogger } from "../src/core/logger";

function cells(line: string): string[] {
  return line.split("│").map((cell) => cell.trim());
}

interface RunResult {
  out: string[];
  err: string[];
  raw: string;
}

describe("drivefs CLI", () => {
  let store: MemoryNodeStore;
  let cwd: string;

  async function run(...args: string[]): Promise<RunResult> {
    const out: string[] = [];
    const err: string[] = [];
    const raw: Buffer[] = [];
    const cli = createCli({
      store,
      cwd,
      env: {},
      logger: DriveFsLogger.silent(),
      io: {
        out: (line) => out.push(line),
        err: (line) => err.push(line),
        raw: (chunk) => raw.push(chunk),
      },
    });
    await cli.parseAsync(args, { from: "user" });
    return { out, err, raw: Buffer.concat(raw).toString("utf8") };
  }

  beforeEach(() => {
    store = new MemoryNodeStore();
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), "drivefs-cli-"));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
    process.exitCode = 0;
  });

  test("mkdir -p, put, cat and ls", async () => {
    const local = path.join(cwd, "hello.txt");
    fs.writeFileSync(local, "Hello World");

    const mkdir = await run("mkdir", "-p", "docs/notes");
    expect(mkdir.out[0]).toMatch(/^Created docs\/notes \(.+\)$/);

    const put = await run("put", local, "docs/hello.txt", "--strategy", "simple", "--buffer-size", "4");
    expect(put.out).toEqual(["Uploaded docs/hello.txt (11B)"]);

    const cat = await run("cat", "docs/hello.txt");
    expect(cat.raw).toBe("Hello World");

    const ls = await run("ls", "docs");
    expect(cells(ls.out[0] ?? "")).toEqual(["NAME", "TYPE", "SIZE", "MODIFIED"]);
    expect(ls.out.slice(2).map((line) => cells(line).slice(0, 3))).toEqual([
      ["hello.txt", "file", "11B"],
      ["notes", "dir", "-"],
    ]);
  });

  test("put rejects an unusable queue depth without creating the file", async () => {
    const local = path.join(cwd, "hello.txt");
    fs.writeFileSync(local, "Hello World");

    const put = await run("put", local, "hello.txt", "--strategy", "boundedQueue", "--queue-depth=0");

    expect(put.err[0]).toMatch(/^Error: Invalid write buffer options: queueDepth: /);
    expect(process.exitCode).toBe(1);
    expect((await run("stat", "hello.txt")).err).toEqual(["Error: `hello.txt' does not exist"]);
  });

  test("ls -n limits the listing", async () => {
    await run("mkdir", "a");
    await run("mkdir", "b");

    const ls = await run("ls", "-n", "1");

    expect(ls.out).toHaveLength(3);
    expect(ls.out[2]?.startsWith("a ")).toBe(true);
  });

  test("stat prints fields", async () => {
    await run("mkdir", "docs");

    const stat = await run("stat", "docs");

    const value = (field: string) =>
      stat.out.map(cells).find((row) => row[0] === field)?.[1];
    expect(value("name")).toBe("docs");
    expect(value("path")).toBe("docs");
    expect(value("type")).toBe("dir");
    expect(value("mode")).toBe("40755");
  });

  test("errors go to stderr with exit code 1", async () => {
    const result = await run("stat", "nope");

    expect(result.err).toEqual(["Error: `nope' does not exist"]);
    expect(process.exitCode).toBe(1);
  });

  test("mv and rm", async () => {
    await run("mkdir", "-p", "a/b");

    expect((await run("mv", "a/b", "a/c")).out).toEqual(["Moved a/b -> a/c"]);
    expect((await run("rm", "a/c")).out).toEqual(["Removed a/c"]);
    expect((await run("stat", "a/c")).err).toEqual(["Error: `a/c' does not exist"]);
    expect((await run("rm", "-f", "a/c")).err).toEqual([]);
  });

  test("--trash, trash ls and trash restore", async () => {
    await run("mkdir", "-p", "keep/old");

    expect((await run("--trash", "rm", "keep/old")).out).toEqual(["Trashed keep/old"]);

    const listed = await run("trash", "ls");
    expect(listed.out.slice(2).map((line) => cells(line)[0])).toEqual(["keep/old"]);

    expect((await run("trash", "restore", "keep/old")).out).toEqual(["Restored keep/old"]);
    expect((await run("trash", "ls")).out).toEqual(["No entries"]);
  });

  test("trash rm moves a path to the trash", async () => {
    await run("mkdir", "x");
    await run("trash", "rm", "x");
    expect((await run("stat", "x")).err).toEqual(["Error: `x' does not exist"]);
  });

  test("--root scopes commands", async () => {
    await run("mkdir", "-p", "Projects/app");

    const ls = await run("--root", "Projects", "ls");

    expect(cells(ls.out[2] ?? "")[0]).toBe("app");
  });

  test("the config file selects the root", async () => {
    await run("mkdir", "-p", "Projects/app");
    fs.writeFileSync(path.join(cwd, CONFIG_FILE_NAME), JSON.stringify({ root: "Projects" }));

    const stat = await run("stat", "app");

    expect(stat.err).toEqual([]);
  });

  test("init writes a config file once", async () => {
    expect((await run("init")).out).toEqual([`Created ${CONFIG_FILE_NAME}`]);
    expect(loadConfig(cwd)).toMatchObject({ root: "", trashForDelete: true, writeBuffer: { strategy: "simple" } });
    expect((await run("init")).out).toEqual([`${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`]);
  });

  test("a malformed config file is reported", () => {
    fs.writeFileSync(path.join(cwd, CONFIG_FILE_NAME), JSON.stringify({ trashForDelete: "yes" }));
    expect(() => loadConfig(cwd)).toThrow(ConfigError);
  });

  test("without a store or credentials the command fails", async () => {
    const err: string[] = [];
    const cli = createCli({ cwd, env: {}, logger: DriveFsLogger.silent(), io: { err: (line) => err.push(line) } });

    await cli.parseAsync(["ls"], { from: "user" });

    expect(err[0]).toMatch(/^Error: no credentials/);
  });
});
