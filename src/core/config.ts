/**
 * DriveFs options, validated with zod.
 */

import { z } from "zod";
import { DriveFsError } from "./errors";
import type { EventBus } from "./eventBus";
import type { FsLogger } from "./logger";
import { DEFAULT_BUFFER_SIZE, DEFAULT_QUEUE_DEPTH } from "./fs/writeBuffer";

export const WriteBufferStrategySchema = z.enum(["none", "simple", "async", "boundedQueue"]);

export const WriteBufferConfigSchema = z.object({
  strategy: WriteBufferStrategySchema.default("none"),
  bufferSize: z.number().int().positive().default(DEFAULT_BUFFER_SIZE),
  queueDepth: z.number().int().positive().default(DEFAULT_QUEUE_DEPTH),
});

export const DriveFsConfigSchema = z
  .object({
    root: z.string().optional(),
    rootId: z.string().min(1).optional(),
    writeBuffer: WriteBufferConfigSchema.default({}),
    trashForDelete: z.boolean().default(false),
  })
  .refine((cfg) => cfg.root === undefined || cfg.rootId === undefined, {
    message: "root and rootId are mutually exclusive",
    path: ["rootId"],
  });

export type DriveFsConfigInput = z.input<typeof DriveFsConfigSchema>;
export type DriveFsConfig = z.output<typeof DriveFsConfigSchema>;

/**
 * Options accepted by DriveFs. `logger` and `eventBus` are live objects and
 * bypass schema validation.
 */
export type DriveFsOptions = DriveFsConfigInput & {
  logger?: FsLogger;
  eventBus?: EventBus;
};

export class ConfigError extends DriveFsError {
  constructor(message: string, public issues: z.ZodIssue[]) {
    super(message, "INVALID_CONFIG", { issues });
    this.name = "ConfigError";
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

export type WriteBufferConfig = z.output<typeof WriteBufferConfigSchema>;

function describeIssues(issues: z.ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

export function parseDriveFsConfig(input: unknown): DriveFsConfig {
  const result = DriveFsConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid drivefs options: ${describeIssues(result.error.issues)}`, result.error.issues);
  }
  return result.data;
}

/**
 * Validate write buffer settings, e.g. a per-open override merged over the defaults.
 */
export function parseWriteBufferConfig(input: unknown): WriteBufferConfig {
  const result = WriteBufferConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigError(`Invalid write buffer options: ${describeIssues(result.error.issues)}`, result.error.issues);
  }
  return result.data;
}
