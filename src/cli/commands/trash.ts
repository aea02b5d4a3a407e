/**
 * src/cli/commands/trash.ts
 * drivefs trash ls [scope] | trash rm <path> | trash restore <path>
 */

import { Command } from "commander";
import { FileNotExistError } from "../../core/errors";
import { normalizePath } from "../../core/fs";
import { CliContext, parseInteger, runAction } from "../context";
import { printTable } from "../utils/printTable";

export function trashCommand(ctx: CliContext): Command {
  const cmd = new Command("trash");
  cmd.description("Inspect and fill the trash");

  const ls = new Command("ls");
  ls.description("List trashed entries under the root")
    .argument("[scope]", "only entries below this directory", "")
    .option("-n, --limit <n>", "show at most n entries", parseInteger, 0)
    .action((scope: string, opts: { limit: number }) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(ls);
        const entries = await fs.listTrash(scope, opts.limit);
        printTable(
          ["PATH", "TYPE", "ID"],
          entries.map((e) => [e.path, e.node.kind === "directory" ? "dir" : "file", e.node.id]),
          ctx.io.out
        );
      })
    );

  const rm = new Command("rm");
  rm.description("Move a path to the trash")
    .argument("<path>", "path to trash")
    .action((target: string) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(rm);
        await fs.trashPath(target);
        ctx.io.out(`Trashed ${target}`);
      })
    );

  const restore = new Command("restore");
  restore
    .description("Take a trashed entry out of the trash")
    .argument("<path>", "original path, as shown by trash ls")
    .action((target: string) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(restore);
        const wanted = normalizePath(target);
        const entry = (await fs.listTrash()).find((e) => e.path === wanted);
        if (!entry) throw new FileNotExistError(wanted);
        await fs.restore(entry);
        ctx.io.out(`Restored ${entry.path}`);
      })
    );

  cmd.addCommand(ls);
  cmd.addCommand(rm);
  cmd.addCommand(restore);
  return cmd;
}
