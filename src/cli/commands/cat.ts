/**
 * src/cli/commands/cat.ts
 * drivefs cat <path>
 */

import { Command } from "commander";
import { CliContext, runAction } from "../context";

export function catCommand(ctx: CliContext): Command {
  const cmd = new Command("cat");
  cmd
    .description("Print a file's content")
    .argument("<path>", "file to print")
    .action((target: string) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(cmd);
        ctx.io.raw(await fs.readFile(target));
      })
    );
  return cmd;
}
