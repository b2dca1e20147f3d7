/**
 * @fileoverview OpenTelemetry SDK initialization and lifecycle management.
 * The SDK is only started when `OTEL_ENABLED=true`. Spans go to the OTLP
 * endpoint when one is configured, otherwise to `traces.log` in the logs
 * directory. Without a started SDK, the `@opentelemetry/api` tracer used by
 * route measurement is a no-op.
 * @module src/utils/telemetry/instrumentation
 */
import {
  type DiagLogger,
  DiagLogLevel,
  diag,
} from "@opentelemetry/api";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { resourceFromAttributes } from "@opentelemetry/resources";
import { NodeSDK } from "@opentelemetry/sdk-node";
import {
  BatchSpanProcessor,
  type ReadableSpan,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node";
import {
  ATTR_SERVICE_NAME,
  ATTR_SERVICE_VERSION,
} from "@opentelemetry/semantic-conventions";
import path from "path";
import winston from "winston";
import type { AppConfig } from "../../config/index.js";
import { AppError, BaseErrorCode } from "../../types-global/errors.js";

let sdk: NodeSDK | null = null;

type DiagWinstonLevel = "error" | "warn" | "info" | "debug";

function toDiagLevel(logLevel: AppConfig["logLevel"]): {
  diagLevel: DiagLogLevel;
  winstonLevel: DiagWinstonLevel;
} {
  switch (logLevel) {
    case "debug":
      return { diagLevel: DiagLogLevel.DEBUG, winstonLevel: "debug" };
    case "info":
    case "notice":
      return { diagLevel: DiagLogLevel.INFO, winstonLevel: "info" };
    case "warning":
      return { diagLevel: DiagLogLevel.WARN, winstonLevel: "warn" };
    default:
      return { diagLevel: DiagLogLevel.ERROR, winstonLevel: "error" };
  }
}

/**
 * Routes the SDK's own diagnostics to `opentelemetry.log`, or to the console
 * when file logging is disabled.
 */
class OtelDiagnosticLogger implements DiagLogger {
  private readonly winstonLogger: winston.Logger;

  constructor(level: DiagWinstonLevel, logsDir: string | null) {
    this.winstonLogger = winston.createLogger({
      level,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
      transports: logsDir
        ? [
            new winston.transports.File({
              filename: path.join(logsDir, "opentelemetry.log"),
              maxsize: 5 * 1024 * 1024,
              maxFiles: 3,
            }),
          ]
        : [new winston.transports.Console()],
    });
  }

  public error(message: string, ...args: unknown[]): void {
    this.winstonLogger.error(message, { args });
  }
  public warn(message: string, ...args: unknown[]): void {
    this.winstonLogger.warn(message, { args });
  }
  public info(message: string, ...args: unknown[]): void {
    this.winstonLogger.info(message, { args });
  }
  public debug(message: string, ...args: unknown[]): void {
    this.winstonLogger.debug(message, { args });
  }
  public verbose(message: string, ...args: unknown[]): void {
    this.winstonLogger.debug(message, { args });
  }
}

/**
 * Writes ended spans to `traces.log` as JSON lines.
 */
class FileSpanProcessor implements SpanProcessor {
  private readonly traceLogger: winston.Logger;

  constructor(logsDir: string) {
    this.traceLogger = winston.createLogger({
      format: winston.format.json(),
      transports: [
        new winston.transports.File({
          filename: path.join(logsDir, "traces.log"),
          maxsize: 10 * 1024 * 1024,
          maxFiles: 5,
        }),
      ],
    });
  }

  forceFlush(): Promise<void> {
    return Promise.resolve();
  }
  onStart(): void {}
  onEnd(span: ReadableSpan): void {
    this.traceLogger.info({
      message: span.name,
      traceId: span.spanContext().traceId,
      spanId: span.spanContext().spanId,
      kind: span.kind,
      startTime: span.startTime,
      endTime: span.endTime,
      duration: span.duration,
      status: span.status,
      attributes: span.attributes,
    });
  }
  shutdown(): Promise<void> {
    return new Promise((resolve) => {
      this.traceLogger.on("finish", () => resolve()).end();
    });
  }
}

/**
 * Starts the Node SDK when telemetry is enabled. Calling it again while an
 * SDK is running returns the running instance.
 * @throws {AppError} `INITIALIZATION_FAILED` if the SDK cannot start.
 */
export function startTelemetry(config: AppConfig): NodeSDK | null {
  if (!config.openTelemetry.enabled) return null;
  if (sdk) return sdk;

  const { diagLevel, winstonLevel } = toDiagLevel(config.logLevel);
  diag.setLogger(new OtelDiagnosticLogger(winstonLevel, config.logsPath), diagLevel);

  try {
    const resource = resourceFromAttributes({
      [ATTR_SERVICE_NAME]: config.openTelemetry.serviceName,
      [ATTR_SERVICE_VERSION]: config.openTelemetry.serviceVersion,
      "deployment.environment.name": config.environment,
    });

    const spanProcessors: SpanProcessor[] = [];
    if (config.openTelemetry.tracesEndpoint) {
      diag.info(
        `Using OTLP exporter for traces, endpoint: ${config.openTelemetry.tracesEndpoint}`,
      );
      spanProcessors.push(
        new BatchSpanProcessor(
          new OTLPTraceExporter({ url: config.openTelemetry.tracesEndpoint }),
        ),
      );
    } else if (config.logsPath) {
      diag.info("No OTLP endpoint configured. Writing spans to traces.log.");
      spanProcessors.push(new FileSpanProcessor(config.logsPath));
    }

    const instance = new NodeSDK({
      resource,
      spanProcessors,
      sampler: new TraceIdRatioBasedSampler(config.openTelemetry.samplingRatio),
    });
    instance.start();
    sdk = instance;
    diag.info(
      `OpenTelemetry initialized for ${config.openTelemetry.serviceName} v${config.openTelemetry.serviceVersion}`,
    );
    return sdk;
  } catch (error) {
    diag.error("Error initializing OpenTelemetry", error);
    throw new AppError(
      BaseErrorCode.INITIALIZATION_FAILED,
      `OpenTelemetry failed to start: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

/**
 * Flushes and stops the SDK, if one was started.
 */
export async function shutdownTelemetry(): Promise<void> {
  if (!sdk) return;
  const running = sdk;
  sdk = null;
  try {
    await running.shutdown();
    diag.info("OpenTelemetry terminated");
  } catch (error) {
    diag.error("Error terminating OpenTelemetry", error);
  }
}
