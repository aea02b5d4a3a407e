/**
 * src/cli/commands/ls.ts
 * drivefs ls [path] [-n limit]
 */

import { Command } from "commander";
import type { FileInfo } from "../../core/fs";
import { formatBytes } from "../../core/logger/formatters";
import { CliContext, parseInteger, runAction } from "../context";
import { printTable } from "../utils/printTable";

export function entryRow(entry: FileInfo): string[] {
  return [
    entry.name,
    entry.isDirectory() ? "dir" : "file",
    entry.isDirectory() ? "-" : formatBytes(entry.size),
    entry.modifiedTime.toISOString(),
  ];
}

export function lsCommand(ctx: CliContext): Command {
  const cmd = new Command("ls");
  cmd
    .description("List a directory")
    .argument("[path]", "directory to list", "")
    .option("-n, --limit <n>", "show at most n entries", parseInteger, 0)
    .action((dirPath: string, opts: { limit: number }) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(cmd);
        const entries = await fs.readdir(dirPath, opts.limit);
        printTable(["NAME", "TYPE", "SIZE", "MODIFIED"], entries.map(entryRow), ctx.io.out);
      })
    );
  return cmd;
}
