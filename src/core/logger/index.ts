/**
 * drivefs logger - Pino-based logging
 *
 * - Structured JSON or pretty output, optional file transport
 * - Optional explicit destination stream (used by tests and embedders)
 * - Can follow an EventBus and log what the filesystem publishes
 *
 * The filesystem only ever sees the FsLogger interface; nothing it does
 * depends on whether or how a message is written.
 */

import pino from "pino";
import type { EventBus, EventEnvelope } from "../eventBus";
import { LoggerConfig, createLoggerConfig } from "./config";
import { createFormatter } from "./formatters";
import { createFileTransport, createPrettyTransport, createStdoutTransport } from "./transports";

export type LoggerContext = Record<string, unknown>;

export interface FsLogger {
  debug(message: string, context?: LoggerContext): void;
  info(message: string, context?: LoggerContext): void;
  warn(message: string, context?: LoggerContext): void;
  error(message: string | Error, context?: LoggerContext): void;
  child(context: LoggerContext): FsLogger;
}

const REDACT_PATHS = [
  "token",
  "access_token",
  "refresh_token",
  "authorization",
  "*.token",
  "*.access_token",
  "*.refresh_token",
  "*.authorization",
];

export class DriveFsLogger implements FsLogger {
  private constructor(private readonly pinoLogger: pino.Logger) {}

  /**
   * @param destination - write here instead of stdout/file transports
   */
  static create(config: Partial<LoggerConfig> = {}, destination?: pino.DestinationStream): DriveFsLogger {
    const resolved = createLoggerConfig(config);
    return new DriveFsLogger(createPinoLogger(resolved, destination));
  }

  static silent(): DriveFsLogger {
    return DriveFsLogger.create({ level: "silent", format: "json" });
  }

  child(context: LoggerContext): DriveFsLogger {
    return new DriveFsLogger(this.pinoLogger.child(context));
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context ?? {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context ?? {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context ?? {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  /**
   * Performance logging
   */
  startTimer(name: string, context?: LoggerContext): () => void {
    const start = Date.now();
    return () => {
      const duration = Date.now() - start;
      this.debug(`Timer: ${name}`, { ...context, duration, timer: name });
    };
  }

  isLevelEnabled(level: pino.Level): boolean {
    return this.pinoLogger.isLevelEnabled(level);
  }

  /**
   * Log every event published on `eventBus`. Returns a function that stops it.
   */
  attach(eventBus: EventBus): () => void {
    const listener = (evt: EventEnvelope) => this.logEvent(evt);
    eventBus.onAny(listener);
    return () => eventBus.offAny(listener);
  }

  private logEvent(evt: EventEnvelope): void {
    const fields = { event: evt.type, eventId: evt.id, ...evt.payload };
    switch (evt.type) {
      case "RootChangeEvent":
        this.pinoLogger.info(fields, "Root changed");
        return;
      case "CacheEvent":
        this.pinoLogger.debug(fields, "Cache updated");
        return;
      case "FsOperationEvent":
      case "UploadEvent": {
        const failed = "ok" in evt.payload && !evt.payload.ok;
        const message = evt.type === "UploadEvent" ? "Upload" : "Filesystem operation";
        if (failed) this.pinoLogger.warn(fields, `${message} failed`);
        else this.pinoLogger.debug(fields, message);
        return;
      }
    }
  }
}

function createPinoLogger(config: LoggerConfig, destination?: pino.DestinationStream): pino.Logger {
  const base: pino.LoggerOptions = {
    level: config.level,
    redact: { paths: REDACT_PATHS, censor: "[REDACTED]" },
    serializers: { err: pino.stdSerializers.err },
  };

  if (destination) {
    return pino({ ...base, formatters: createFormatter(config, { levelLabels: true }) }, destination);
  }

  const targets: pino.TransportTargetOptions[] = [];
  if (config.format === "pretty") {
    targets.push(createPrettyTransport(config.level));
  } else if (config.file?.enabled) {
    targets.push(createStdoutTransport(config.level));
  }
  if (config.file?.enabled) {
    targets.push(createFileTransport(config.file, config.level));
  }

  if (targets.length === 0) {
    return pino({ ...base, formatters: createFormatter(config, { levelLabels: true }) });
  }

  return pino(
    { ...base, formatters: createFormatter(config, { levelLabels: false }) },
    pino.transport({ targets })
  );
}

/**
 * Build a logger from configuration.
 */
export function createLogger(config: Partial<LoggerConfig> = {}, destination?: pino.DestinationStream): DriveFsLogger {
  return DriveFsLogger.create(config, destination);
}

export type { LoggerConfig, LogLevel, LogFormat } from "./config";
export { parseLogLevel, parseLogFormat, createLoggerConfig } from "./config";
