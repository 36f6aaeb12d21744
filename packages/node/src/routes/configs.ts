/**
 * Config routes.
 *
 * GET    /api/v1/configs                     — List current records
 * GET    /api/v1/configs/:digest             — Current record for a digest
 * PUT    /api/v1/configs/:digest             — Set (insert or replace)
 * POST   /api/v1/configs/:digest/activate    — Activate
 * POST   /api/v1/configs/:digest/deactivate  — Deactivate
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { OracleService } from "../services/oracle-service.js";
import { requirePermission } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";
import { SetConfigSchema, ToggleConfigSchema } from "../types/dto.js";

export function createConfigRoutes(service: OracleService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", requirePermission("read"), (c) => {
    const configs = service.listConfigs(c.get("auth"));
    return c.json({
      data: configs,
      registryVersion: service.registry.version,
    });
  });

  routes.get("/:digest", requirePermission("read"), (c) => {
    const record = service.getConfig(c.get("auth"), c.req.param("digest"));
    return c.json({ data: record });
  });

  routes.put("/:digest", requirePermission("configure"), async (c) => {
    const body = await validateBody(c, SetConfigSchema);
    const result = service.setConfig(
      c.get("auth"),
      c.req.param("digest"),
      body.signers,
      body.f,
      body.expectedVersion,
    );
    return c.json({ data: result.record, version: result.version });
  });

  routes.post("/:digest/activate", requirePermission("configure"), async (c) => {
    const body = await validateBody(c, ToggleConfigSchema);
    const result = service.activateConfig(
      c.get("auth"),
      c.req.param("digest"),
      body.expectedVersion,
    );
    return c.json({ data: result.record, version: result.version });
  });

  routes.post("/:digest/deactivate", requirePermission("configure"), async (c) => {
    const body = await validateBody(c, ToggleConfigSchema);
    const result = service.deactivateConfig(
      c.get("auth"),
      c.req.param("digest"),
      body.expectedVersion,
    );
    return c.json({ data: result.record, version: result.version });
  });

  return routes;
}
