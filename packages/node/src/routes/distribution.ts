/**
 * Distribution routes.
 *
 * POST /api/v1/distribution         — Publish a snapshot and hand it to users
 * POST /api/v1/distribution/revoke  — Withdraw users' handles
 * GET  /api/v1/distribution/me      — The caller's current handle
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { OracleService } from "../services/oracle-service.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { UsersSchema } from "../types/dto.js";

export function createDistributionRoutes(service: OracleService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/", requirePermission("distribute"), async (c) => {
    const body = await validateBody(c, UsersSchema);
    const result = service.distribute(c.get("auth"), body.users);
    return c.json({ data: result }, 201);
  });

  routes.post("/revoke", requirePermission("distribute"), async (c) => {
    const body = await validateBody(c, UsersSchema);
    const revoked = service.revoke(c.get("auth"), body.users);
    return c.json({ data: { revoked } });
  });

  routes.get("/me", requirePermission("verify"), (c) => {
    const handle = service.handleFor(c.get("auth"));
    return c.json({ data: handle });
  });

  return routes;
}
