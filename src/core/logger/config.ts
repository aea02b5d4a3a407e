/**
 * Logger configuration for drivefs.
 *
 * LOG_LEVEL and LOG_FORMAT come from the environment or drivefs.config.json;
 * anything pino would not accept falls back to the defaults below.
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export const LogFormatSchema = z.enum(["json", "pretty"]);

export const LoggerConfigSchema = z.object({
  level: LogLevelSchema.default("info"),
  format: LogFormatSchema.default("pretty"),
  /** Extra JSON-lines copy of the log, written through pino/file. */
  file: z
    .object({
      enabled: z.boolean().default(false),
      path: z.string().min(1).default("./logs/drivefs.log"),
    })
    .optional(),
  /** Added to every line as `source` (the CLI sets "cli"). */
  source: z.string().optional(),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;
export type LoggerConfig = z.output<typeof LoggerConfigSchema>;
export type FileTransportConfig = NonNullable<LoggerConfig["file"]>;

export function createLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return LoggerConfigSchema.parse(config);
}

export function parseLogLevel(level: string | undefined, fallback: LogLevel = "info"): LogLevel {
  const result = LogLevelSchema.safeParse(level?.trim().toLowerCase());
  return result.success ? result.data : fallback;
}

export function parseLogFormat(format: string | undefined, fallback: LogFormat = "pretty"): LogFormat {
  const result = LogFormatSchema.safeParse(format?.trim().toLowerCase());
  return result.success ? result.data : fallback;
}
