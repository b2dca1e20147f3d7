/**
 * @fileoverview Binds the Hono app to a TCP port with `@hono/node-server`.
 * When the configured port is taken, the next ports are tried up to
 * `maxPortRetries` times.
 * @module src/api-server/transports/httpTransport
 */

import { serve, type ServerType } from "@hono/node-server";
import type { Hono } from "hono";
import http from "http";
import type net from "net";
import { AppError, BaseErrorCode } from "../../types-global/errors.js";
import {
  logger,
  type RequestContext,
  requestContextService,
} from "../../utils/index.js";

export interface HttpListenOptions {
  port: number;
  host: string;
  maxPortRetries: number;
}

export interface StartedHttpServer {
  server: ServerType;
  port: number;
}

export async function isPortInUse(
  port: number,
  host: string,
  parentContext: RequestContext,
): Promise<boolean> {
  const checkContext = requestContextService.createRequestContext({
    ...parentContext,
    operation: "isPortInUse",
    port,
    host,
  });
  return new Promise((resolve) => {
    const tempServer = http.createServer();
    tempServer
      .once("error", (err: NodeJS.ErrnoException) => {
        logger.debug(`Port check failed with ${err.code ?? "unknown"}.`, checkContext);
        resolve(err.code === "EADDRINUSE");
      })
      .once("listening", () => {
        tempServer.close(() => resolve(false));
      })
      .listen(port, host);
  });
}

function listen(
  app: Hono,
  port: number,
  host: string,
  context: RequestContext,
): Promise<ServerType> {
  return new Promise((resolve, reject) => {
    const serverInstance = serve(
      { fetch: app.fetch, port, hostname: host },
      (info) => {
        const serverAddress = `http://${info.address}:${info.port}`;
        logger.info(`HTTP server listening at ${serverAddress}`, {
          ...context,
          address: serverAddress,
        });
        if (process.stdout.isTTY) {
          console.log(`\nPubMed Research API running at: ${serverAddress}\n`);
        }
        resolve(serverInstance);
      },
    );
    const netServer: net.Server = serverInstance;
    netServer.once("error", reject);
  });
}

export async function startHttpServer(
  app: Hono,
  options: HttpListenOptions,
  parentContext: RequestContext,
): Promise<StartedHttpServer> {
  const startContext = requestContextService.createRequestContext({
    ...parentContext,
    operation: "startHttpServer",
  });

  for (let i = 0; i <= options.maxPortRetries; i++) {
    const currentPort = options.port + i;
    const attemptContext = { ...startContext, port: currentPort, attempt: i + 1 };

    if (await isPortInUse(currentPort, options.host, attemptContext)) {
      logger.warning(`Port ${currentPort} is in use, retrying...`, attemptContext);
      continue;
    }

    try {
      const server = await listen(app, currentPort, options.host, attemptContext);
      return { server, port: currentPort };
    } catch (err: unknown) {
      const code =
        err instanceof Error && "code" in err ? String(err.code) : undefined;
      if (code !== "EADDRINUSE") {
        throw new AppError(
          BaseErrorCode.INITIALIZATION_FAILED,
          `Failed to start HTTP server: ${err instanceof Error ? err.message : String(err)}`,
          { port: currentPort, code },
        );
      }
      logger.warning(`Port ${currentPort} was taken while binding, retrying...`, attemptContext);
    }
  }

  throw new AppError(
    BaseErrorCode.INITIALIZATION_FAILED,
    `Failed to bind to any port between ${options.port} and ${options.port + options.maxPortRetries}.`,
  );
}

/**
 * Stops accepting connections and resolves once open ones have finished.
 */
export function closeHttpServer(server: ServerType): Promise<void> {
  const netServer: net.Server = server;
  return new Promise((resolve, reject) => {
    netServer.close((err?: Error) => (err ? reject(err) : resolve()));
  });
}
