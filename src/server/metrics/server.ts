/**
 * Internal metrics HTTP server
 *
 * Runs a minimal HTTP server on an internal port for Prometheus scraping,
 * next to the worker loop. GET /metrics returns the registry, GET /health
 * confirms the process is alive; everything else is 404.
 */

import { createServer, type Server } from "node:http";

import { logger } from "@/lib/logger";
import type { Database } from "../db";
import { collectAllMetrics } from "./collect";
import { metricsEnabled, registry } from "./metrics";

let server: Server | null = null;

/**
 * Starts the internal metrics HTTP server.
 *
 * @returns The server instance, or null if metrics are disabled
 */
export function startMetricsServer(db: Database, port = 9092): Server | null {
  if (!metricsEnabled) {
    logger.info("Metrics disabled, skipping internal metrics server");
    return null;
  }

  if (server) {
    logger.warn("Metrics server already running");
    return server;
  }

  server = createServer((req, res) => {
    if (req.method === "GET" && req.url === "/metrics") {
      collectAllMetrics(db)
        .then(() => registry.metrics())
        .then((metrics) => {
          res.writeHead(200, { "Content-Type": registry.contentType });
          res.end(metrics);
        })
        .catch((error: unknown) => {
          logger.error("Failed to collect metrics", {
            error: error instanceof Error ? error.message : "Unknown error",
          });
          res.writeHead(500, { "Content-Type": "text/plain" });
          res.end("Internal Server Error");
        });
    } else if (req.method === "GET" && req.url === "/health") {
      res.writeHead(200, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ status: "healthy" }));
    } else {
      res.writeHead(404, { "Content-Type": "text/plain" });
      res.end("Not Found");
    }
  });

  server.listen(port, () => {
    logger.info("Internal metrics server started", { port });
  });

  return server;
}

/**
 * Stops the internal metrics HTTP server.
 */
export function stopMetricsServer(): Promise<void> {
  return new Promise((resolve) => {
    if (!server) {
      resolve();
      return;
    }

    server.close(() => {
      logger.info("Internal metrics server stopped");
      server = null;
      resolve();
    });
  });
}
