/**
 * Logger Formatters
 * Pino formatters and display helpers
 */

import type { LoggerOptions } from "pino";
import { LoggerConfig } from "./config";

/**
 * Create Pino formatters based on configuration.
 * Multi-target transports reject a custom level formatter, so it is opt-in.
 */
export function createFormatter(
  config: LoggerConfig,
  options: { levelLabels: boolean }
): NonNullable<LoggerOptions["formatters"]> {
  const log = (obj: Record<string, unknown>): Record<string, unknown> => {
    if (config.source) {
      return { ...obj, source: config.source };
    }
    return obj;
  };

  if (!options.levelLabels) {
    return { log };
  }

  return {
    level: (label: string) => ({ level: label }),
    log,
  };
}

/**
 * Format bytes for display
 */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  let unitIndex = 0;

  while (value >= 1024 && unitIndex < units.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  return unitIndex === 0 ? `${value}B` : `${value.toFixed(2)}${units[unitIndex]}`;
}
