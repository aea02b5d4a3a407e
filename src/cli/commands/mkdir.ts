/**
 * src/cli/commands/mkdir.ts
 * drivefs mkdir [-p] <path>
 */

import { Command } from "commander";
import { CliContext, runAction } from "../context";

export function mkdirCommand(ctx: CliContext): Command {
  const cmd = new Command("mkdir");
  cmd
    .description("Create a directory")
    .argument("<path>", "directory to create")
    .option("-p, --parents", "create missing parents")
    .action((target: string, opts: { parents?: boolean }) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(cmd);
        const info = opts.parents ? await fs.mkdirAll(target) : await fs.mkdir(target);
        ctx.io.out(`Created ${info.path} (${info.id})`);
      })
    );
  return cmd;
}
