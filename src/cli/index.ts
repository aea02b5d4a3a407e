#!/usr/bin/env node
/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { catCommand } from "./commands/cat";
import { initCommand } from "./commands/init";
import { lsCommand } from "./commands/ls";
import { mkdirCommand } from "./commands/mkdir";
import { mvCommand } from "./commands/mv";
import { putCommand } from "./commands/put";
import { rmCommand } from "./commands/rm";
import { statCommand } from "./commands/stat";
import { trashCommand } from "./commands/trash";
import { CliDeps, createContext } from "./context";

export function createCli(deps: CliDeps = {}): Command {
  const ctx = createContext(deps);
  const program = new Command();

  program
    .name("drivefs")
    .description("Browse and edit a Google Drive as a path-addressed filesystem")
    .version("0.1.0")
    .option("--root <path>", "directory to use as root, resolved from the top of the drive")
    .option("--root-id <id>", "node id to use as root")
    .option("--token-file <file>", "OAuth token JSON file (or DRIVEFS_TOKEN_FILE / DRIVEFS_TOKEN)")
    .option("--trash", "move to trash instead of deleting")
    .option("--memory", "run against an in-process store");

  program.addCommand(initCommand(ctx, () => deps.cwd ?? process.cwd()));
  program.addCommand(lsCommand(ctx));
  program.addCommand(statCommand(ctx));
  program.addCommand(mkdirCommand(ctx));
  program.addCommand(mvCommand(ctx));
  program.addCommand(rmCommand(ctx));
  program.addCommand(catCommand(ctx));
  program.addCommand(putCommand(ctx));
  program.addCommand(trashCommand(ctx));

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    });
}
