/**
 * src/cli/commands/put.ts
 * drivefs put <local> <remote> [--strategy s] [--buffer-size n] [--queue-depth n]
 */

import { Command } from "commander";
import { createReadStream } from "fs";
import type { WriteBufferStrategyName } from "../../core/eventBus";
import { O_CREATE, O_TRUNC, O_WRONLY } from "../../core/fs";
import { formatBytes } from "../../core/logger/formatters";
import { CliContext, parseInteger, parseStrategy, runAction } from "../context";

interface PutOptions {
  strategy?: WriteBufferStrategyName;
  bufferSize?: number;
  queueDepth?: number;
}

export function putCommand(ctx: CliContext): Command {
  const cmd = new Command("put");
  cmd
    .description("Upload a local file, creating missing parent directories")
    .argument("<local>", "local file to read")
    .argument("<remote>", "destination path")
    .option("--strategy <name>", "write buffer strategy (none|simple|async|boundedQueue)", parseStrategy)
    .option("--buffer-size <bytes>", "write buffer size", parseInteger)
    .option("--queue-depth <chunks>", "bounded queue depth", parseInteger)
    .action((local: string, remote: string, opts: PutOptions) =>
      runAction(ctx, async () => {
        const fs = await ctx.openFs(cmd);
        const handle = await fs.openFile(remote, O_WRONLY | O_CREATE | O_TRUNC, 0o644, {
          writeBuffer: {
            ...(opts.strategy ? { strategy: opts.strategy } : {}),
            ...(opts.bufferSize !== undefined ? { bufferSize: opts.bufferSize } : {}),
            ...(opts.queueDepth !== undefined ? { queueDepth: opts.queueDepth } : {}),
          },
        });
        try {
          for await (const chunk of createReadStream(local)) {
            await handle.write(Buffer.from(chunk));
          }
        } finally {
          await handle.close();
        }
        const info = await fs.stat(remote);
        ctx.io.out(`Uploaded ${info.path} (${formatBytes(info.size)})`);
      })
    );
  return cmd;
}
