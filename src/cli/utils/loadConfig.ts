/**
 * src/cli/utils/loadConfig.ts
 * Reads drivefs.config.json from the working directory.
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigError, WriteBufferConfigSchema } from "../../core/config";

export const CONFIG_FILE_NAME = "drivefs.config.json";

export const CliConfigSchema = z.object({
  root: z.string().optional(),
  rootId: z.string().min(1).optional(),
  tokenFile: z.string().optional(),
  trashForDelete: z.boolean().optional(),
  writeBuffer: WriteBufferConfigSchema.partial().optional(),
  logger: z
    .object({
      level: z.string().optional(),
      format: z.string().optional(),
    })
    .optional(),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

export function loadConfig(cwd: string = process.cwd()): CliConfig {
  const p = path.join(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(p)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(p, "utf8"));
  } catch (err) {
    throw new ConfigError(`${CONFIG_FILE_NAME}: ${err instanceof Error ? err.message : String(err)}`, []);
  }

  const result = CliConfigSchema.safeParse(raw);
  if (!result.success) {
    const message = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError(`${CONFIG_FILE_NAME}: ${message}`, result.error.issues);
  }
  return result.data;
}
