/**
 * src/cli/commands/mv.ts
 * drivefs mv <from> <to>
 */

import { Command } from "commander";
import { CliContext, runAction } from "../context";

export function mvCommand(ctx: CliContext): Command {
  const cmd = new Command("mv");
  cmd
    .description("Rename or move a file or directory")
    .argument("<from>", "existing path")
    .argument("<to>", "new path; its parent must exist")
    .action((from: string, to: string) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(cmd);
        const info = await fs.rename(from, to);
        ctx.io.out(`Moved ${from} -> ${info.path}`);
      })
    );
  return cmd;
}
