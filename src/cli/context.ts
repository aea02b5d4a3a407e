/**
 * src/cli/context.ts
 * Builds the DriveFs a command runs against, from flags, env and drivefs.config.json.
 */

import { Command, InvalidArgumentError } from "commander";
import { WriteBufferStrategySchema } from "../core/config";
import { decodeTokenBase64, loadTokenFromFile, OAuthToken } from "../core/auth/tokenStore";
import { DriveClient } from "../core/drive/client";
import { MemoryNodeStore } from "../core/drive/memoryStore";
import { createBearerTransport } from "../core/drive/transport";
import type { RemoteNodeStore } from "../core/drive/types";
import { DriveFsError } from "../core/errors";
import { EventBus, WriteBufferStrategyName } from "../core/eventBus";
import { DriveFs } from "../core/fs";
import { DriveFsLogger, parseLogFormat, parseLogLevel } from "../core/logger";
import { loadConfig } from "./utils/loadConfig";
import { LineWriter } from "./utils/printTable";

export interface GlobalOptions {
  root?: string;
  rootId?: string;
  tokenFile?: string;
  trash?: boolean;
  memory?: boolean;
}

export interface CliIO {
  out: LineWriter;
  err: LineWriter;
  raw: (chunk: Buffer) => void;
}

export interface CliDeps {
  /** Use this store instead of building one from credentials. */
  store?: RemoteNodeStore;
  logger?: DriveFsLogger;
  io?: Partial<CliIO>;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface CliContext {
  io: CliIO;
  openFs(cmd: Command): Promise<DriveFs>;
}

export function createContext(deps: CliDeps = {}): CliContext {
  const io: CliIO = {
    out: deps.io?.out ?? ((line) => console.log(line)),
    err: deps.io?.err ?? ((line) => console.error(line)),
    raw: deps.io?.raw ?? ((chunk) => process.stdout.write(chunk)),
  };
  const env = deps.env ?? process.env;
  let cached: DriveFs | null = null;

  return {
    io,
    async openFs(cmd: Command): Promise<DriveFs> {
      if (cached) return cached;
      const opts = cmd.optsWithGlobals<GlobalOptions>();
      const config = loadConfig(deps.cwd);

      const logger =
        deps.logger ??
        DriveFsLogger.create({
          level: parseLogLevel(env.LOG_LEVEL ?? config.logger?.level, "warn"),
          format: parseLogFormat(env.LOG_FORMAT ?? config.logger?.format),
          source: "cli",
        });
      const eventBus = new EventBus({ maxHistorySize: 100 });
      logger.attach(eventBus);

      const store =
        deps.store ??
        (opts.memory ? new MemoryNodeStore() : createDriveStore(opts.tokenFile ?? config.tokenFile, env));

      const rootId = opts.rootId ?? config.rootId;
      const root = opts.root ?? env.DRIVEFS_ROOT ?? config.root;

      cached = await DriveFs.create(store, {
        rootId,
        root: rootId === undefined ? root : undefined,
        trashForDelete: opts.trash ?? config.trashForDelete ?? false,
        writeBuffer: config.writeBuffer,
        logger,
        eventBus,
      });
      return cached;
    },
  };
}

function createDriveStore(tokenFile: string | undefined, env: NodeJS.ProcessEnv): RemoteNodeStore {
  const token = resolveToken(tokenFile ?? env.DRIVEFS_TOKEN_FILE, env.DRIVEFS_TOKEN);
  return new DriveClient(createBearerTransport(() => token.access_token));
}

function resolveToken(tokenFile: string | undefined, encoded: string | undefined): OAuthToken {
  if (tokenFile) return loadTokenFromFile(tokenFile);
  if (encoded) return decodeTokenBase64(encoded);
  throw new DriveFsError(
    "no credentials: set DRIVEFS_TOKEN or DRIVEFS_TOKEN_FILE, pass --token-file, or use --memory",
    "NO_CREDENTIALS"
  );
}

export function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) throw new InvalidArgumentError("Not a number.");
  return parsed;
}

export function parseStrategy(value: string): WriteBufferStrategyName {
  const parsed = WriteBufferStrategySchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidArgumentError(`Expected one of: ${WriteBufferStrategySchema.options.join(", ")}.`);
  }
  return parsed.data;
}

/**
 * Run a command body, reporting failures on stderr with exit code 1.
 */
export async function runAction(ctx: CliContext, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (err) {
    ctx.io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  }
}
