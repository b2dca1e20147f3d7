/**
 * @fileoverview Winston-based logging singleton using RFC 5424 syslog levels.
 * Writes JSON lines to `error.log` and `combined.log` under the configured logs
 * directory and always logs to the console: colourised text on a TTY, JSON
 * otherwise. Until {@link Logger.initialize} is called every log call is a
 * no-op.
 * @module src/utils/internal/logger
 */

import path from "path";
import winston from "winston";
import { requestContextService } from "./requestContext.js";

export const LOG_LEVELS = [
  "debug",
  "info",
  "notice",
  "warning",
  "error",
  "crit",
  "alert",
  "emerg",
] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerOptions {
  level: LogLevel;
  /** Directory for file transports; `null` disables file logging. */
  logsPath: string | null;
}

type LogContext = Record<string, unknown>;

const prettyConsoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: "HH:mm:ss.SSS" }),
  winston.format.printf((info) => {
    const { timestamp, level, message, ...meta } = info;
    const metaKeys = Object.keys(meta);
    const metaString =
      metaKeys.length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${String(timestamp)} ${level}: ${String(message)}${metaString}`;
  }),
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json(),
);

export class Logger {
  private static instance: Logger | undefined;
  private winstonLogger: winston.Logger | undefined;

  private constructor() {}

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public initialize(options: LoggerOptions): void {
    if (this.winstonLogger) {
      this.warning("Logger already initialized; ignoring repeated call.");
      return;
    }

    const fileTransports = options.logsPath
      ? [
          new winston.transports.File({
            filename: path.join(options.logsPath, "error.log"),
            level: "error",
            format: jsonFormat,
          }),
          new winston.transports.File({
            filename: path.join(options.logsPath, "combined.log"),
            format: jsonFormat,
          }),
        ]
      : [];

    const identity = requestContextService.getConfig();
    this.winstonLogger = winston.createLogger({
      levels: winston.config.syslog.levels,
      level: options.level,
      defaultMeta: {
        service: identity.appName,
        version: identity.appVersion,
        environment: identity.environment,
      },
      transports: [
        ...fileTransports,
        new winston.transports.Console({
          format: process.stdout.isTTY ? prettyConsoleFormat : jsonFormat,
        }),
      ],
    });

    this.info(`Logger initialized at level '${options.level}'.`, {
      logsPath: options.logsPath ?? "(file logging disabled)",
    });
  }

  public debug(msg: string, context?: LogContext): void {
    this.log("debug", msg, context);
  }

  public info(msg: string, context?: LogContext): void {
    this.log("info", msg, context);
  }

  public notice(msg: string, context?: LogContext): void {
    this.log("notice", msg, context);
  }

  public warning(msg: string, context?: LogContext): void {
    this.log("warning", msg, context);
  }

  public error(
    msg: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    this.logWithError("error", msg, errorOrContext, context);
  }

  public crit(
    msg: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    this.logWithError("crit", msg, errorOrContext, context);
  }

  /**
   * Flushes and closes all transports.
   */
  public async close(): Promise<void> {
    const winstonLogger = this.winstonLogger;
    if (!winstonLogger) return;
    this.winstonLogger = undefined;
    await new Promise<void>((resolve) => {
      winstonLogger.on("finish", () => resolve());
      winstonLogger.end();
    });
  }

  private logWithError(
    level: LogLevel,
    msg: string,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    if (errorOrContext instanceof Error) {
      this.log(level, msg, {
        ...context,
        error: {
          name: errorOrContext.name,
          message: errorOrContext.message,
          stack: errorOrContext.stack,
        },
      });
      return;
    }
    this.log(level, msg, { ...errorOrContext, ...context });
  }

  private log(level: LogLevel, msg: string, context?: LogContext): void {
    if (!this.winstonLogger) return;
    this.winstonLogger.log(level, msg, context ?? {});
  }
}

export const logger = Logger.getInstance();
