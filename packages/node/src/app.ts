/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes.
 * Separated from main.ts for testability — tests create the app
 * without starting the HTTP server.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { OracleService } from "./services/oracle-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware, pinoRequestLog } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import {
  createAuditRoutes,
  createConfigRoutes,
  createDistributionRoutes,
  createHealthRoutes,
  createReportRoutes,
} from "./routes/index.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  /** Auth configuration. Every /api route requires credentials. */
  readonly auth: AuthConfig;
  /** Structured logger for mutations and unexpected errors */
  readonly logger?: Logger;
  /** Request log sink (default: the logger, when one is given) */
  readonly logFn?: (entry: RequestLogEntry) => void;
  /** Clock shared by the registry, ledger, audit log and health route */
  readonly now?: () => Date;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: OracleService;
}

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new OracleService({
    ...(options.now !== undefined ? { now: options.now } : {}),
    ...(options.logger !== undefined ? { logger: options.logger } : {}),
  });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  const logFn =
    options.logFn ??
    (options.logger !== undefined ? pinoRequestLog(options.logger) : undefined);
  if (logFn !== undefined) {
    app.use("*", loggerMiddleware(logFn));
  }

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(options.logger));

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service, options.now));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", authMiddleware(options.auth));

  app.route("/api/v1/configs", createConfigRoutes(service));
  app.route("/api/v1/distribution", createDistributionRoutes(service));
  app.route("/api/v1/reports", createReportRoutes(service));
  app.route("/api/v1/audit", createAuditRoutes(service.auditLog));

  return { app, service };
}
