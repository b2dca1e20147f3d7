#!/usr/bin/env node
/**
 * @fileoverview Process entry point. Loads configuration, initializes logging
 * and telemetry, builds the API app, binds it, and wires graceful shutdown.
 * @module src/index
 */

import type { ServerType } from "@hono/node-server";
import { createApiApp } from "./api-server/server.js";
import {
  closeHttpServer,
  startHttpServer,
} from "./api-server/transports/httpTransport.js";
import { type AppConfig, loadConfig } from "./config/index.js";
import { createNcbiService } from "./services/NCBI/core/ncbiService.js";
import { AppError } from "./types-global/errors.js";
import {
  ErrorHandler,
  logger,
  registerProcessHandlers,
  requestContextService,
} from "./utils/index.js";
import {
  shutdownTelemetry,
  startTelemetry,
} from "./utils/telemetry/instrumentation.js";

let httpServer: ServerType | undefined;
let isShuttingDown = false;

const shutdown = async (trigger: string, exitCode: number): Promise<void> => {
  if (isShuttingDown) return;
  isShuttingDown = true;

  const shutdownContext = requestContextService.createRequestContext({
    operation: "ServerShutdown",
    triggerEvent: trigger,
  });
  logger.info(`Received ${trigger}. Initiating graceful shutdown...`, shutdownContext);

  try {
    if (httpServer) {
      await closeHttpServer(httpServer);
      logger.info("HTTP server closed.", shutdownContext);
    }
    await shutdownTelemetry();
    logger.info("Graceful shutdown completed.", shutdownContext);
    await logger.close();
    process.exit(exitCode);
  } catch (error) {
    ErrorHandler.handleError(error, {
      operation: "ServerShutdown",
      context: shutdownContext,
      critical: true,
    });
    await logger.close();
    process.exit(1);
  }
};

const loadConfigOrExit = (): AppConfig => {
  try {
    return loadConfig();
  } catch (error) {
    // The logger is not up yet, so this goes to stderr directly.
    const message = error instanceof AppError ? error.message : String(error);
    console.error(`Configuration error: ${message}`);
    process.exit(1);
  }
};

const start = async (): Promise<void> => {
  const config = loadConfigOrExit();

  requestContextService.configure({
    appName: config.serviceName,
    appVersion: config.serviceVersion,
    environment: config.environment,
  });
  logger.initialize({ level: config.logLevel, logsPath: config.logsPath });

  const startupContext = requestContextService.createRequestContext({
    operation: "ServerStartup",
    applicationName: config.serviceName,
    applicationVersion: config.serviceVersion,
    nodeEnvironment: config.environment,
  });
  logger.info(`Starting ${config.serviceName} (v${config.serviceVersion})...`, startupContext);
  for (const warning of config.warnings) {
    logger.warning(warning, startupContext);
  }

  try {
    startTelemetry(config);
    const ncbiService = createNcbiService(config.ncbi);
    const app = createApiApp({ config, ncbiService });
    const { server, port } = await startHttpServer(
      app,
      {
        port: config.http.port,
        host: config.http.host,
        maxPortRetries: config.http.maxPortRetries,
      },
      startupContext,
    );
    httpServer = server;
    logger.notice(`${config.serviceName} is ready on port ${port}.`, startupContext);
  } catch (error) {
    ErrorHandler.handleError(error, {
      operation: "ServerStartup",
      context: startupContext,
      critical: true,
    });
    await logger.close();
    process.exit(1);
  }

  registerProcessHandlers(process, shutdown);
};

void start();
