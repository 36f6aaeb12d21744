/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { OracleService } from "../services/oracle-service.js";

export function createHealthRoutes(
  service: OracleService,
  now: () => Date = () => new Date(),
): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      registryVersion: service.registry.version,
      configs: service.registry.digests().length,
      timestamp: now().toISOString(),
    });
  });

  return routes;
}
