/**
 * Report routes.
 *
 * POST /api/v1/reports/verify — Verify a signed report against the
 *                               caller's distributed snapshot
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { OracleService } from "../services/oracle-service.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { VerifyReportSchema } from "../types/dto.js";

export function createReportRoutes(service: OracleService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/verify", requirePermission("verify"), async (c) => {
    const body = await validateBody(c, VerifyReportSchema);
    const verified = service.verify(c.get("auth"), body.report, body.snapshotId);
    return c.json({ data: verified });
  });

  return routes;
}
