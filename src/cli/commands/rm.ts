/**
 * src/cli/commands/rm.ts
 * drivefs rm <path>
 */

import { Command } from "commander";
import { CliContext, runAction } from "../context";

export function rmCommand(ctx: CliContext): Command {
  const cmd = new Command("rm");
  cmd
    .description("Remove a file or directory (trashed instead when --trash is set)")
    .argument("<path>", "path to remove")
    .option("-f, --force", "ignore a missing path")
    .action((target: string, opts: { force?: boolean }) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(cmd);
        if (opts.force) await fs.removeAll(target);
        else await fs.remove(target);
        ctx.io.out(`${fs.trashForDelete ? "Trashed" : "Removed"} ${target}`);
      })
    );
  return cmd;
}
