/**
 * src/cli/commands/init.ts
 * drivefs init
 */

import { Command } from "commander";
import fs from "fs";
import path from "path";
import { promisify } from "util";
import { DEFAULT_BUFFER_SIZE, DEFAULT_QUEUE_DEPTH } from "../../core/fs/writeBuffer";
import { CliContext, runAction } from "../context";
import { CONFIG_FILE_NAME, CliConfig } from "../utils/loadConfig";

const writeFile = promisify(fs.writeFile);

export const DEFAULT_CLI_CONFIG: CliConfig = {
  root: "",
  trashForDelete: true,
  writeBuffer: { strategy: "simple", bufferSize: DEFAULT_BUFFER_SIZE, queueDepth: DEFAULT_QUEUE_DEPTH },
  logger: { level: "warn", format: "pretty" },
};

export function initCommand(ctx: CliContext, cwd: () => string = () => process.cwd()): Command {
  const cmd = new Command("init");
  cmd
    .description(`Write a default ${CONFIG_FILE_NAME} in the current directory`)
    .option("-f, --force", "overwrite an existing file")
    .action((opts: { force?: boolean }) =>
      runAction(ctx, async () => {
        const configPath = path.join(cwd(), CONFIG_FILE_NAME);
        if (!opts.force && fs.existsSync(configPath)) {
          ctx.io.out(`${CONFIG_FILE_NAME} already exists. Use --force to overwrite.`);
          return;
        }
        await writeFile(configPath, JSON.stringify(DEFAULT_CLI_CONFIG, null, 2) + "\n", { encoding: "utf8" });
        ctx.io.out(`Created ${CONFIG_FILE_NAME}`);
      })
    );
  return cmd;
}
