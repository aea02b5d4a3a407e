/**
 * src/cli/commands/stat.ts
 * drivefs stat <path>
 */

import { Command } from "commander";
import { CliContext, runAction } from "../context";
import { printTable } from "../utils/printTable";

export function statCommand(ctx: CliContext): Command {
  const cmd = new Command("stat");
  cmd
    .description("Show metadata of a file or directory")
    .argument("<path>", "path relative to the root")
    .action((target: string) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(cmd);
        const info = await fs.stat(target);
        printTable(
          ["FIELD", "VALUE"],
          [
            ["name", info.name],
            ["path", info.path],
            ["id", info.id],
            ["type", info.isDirectory() ? "dir" : "file"],
            ["size", String(info.size)],
            ["mode", info.mode.toString(8)],
            ["modified", info.modifiedTime.toISOString()],
          ],
          ctx.io.out
        );
      })
    );
  return cmd;
}
