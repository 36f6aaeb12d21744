/**
 * Audit routes.
 *
 * GET /api/v1/audit — Query the audit log (newest first)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { AuditLog } from "../services/audit-log.js";
import { requirePermission } from "../middleware/auth.js";
import { validateQuery } from "../middleware/validate.js";
import { AuditQuerySchema } from "../types/dto.js";

export function createAuditRoutes(auditLog: AuditLog): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const query = validateQuery(c, AuditQuerySchema);
    const entries = auditLog.query(query);
    return c.json({ data: entries, total: auditLog.size });
  });

  return routes;
}
