/**
 * Access policy for service operations.
 *
 * Route guards reject early; the service checks again so that callers
 * bypassing HTTP are held to the same rules.
 */

import type { AuthContext, Permission } from "../types/auth.js";
import { hasPermission } from "../types/auth.js";

export class AccessDeniedError extends Error {
  readonly code = "FORBIDDEN";
  readonly details: Readonly<Record<string, unknown>>;

  constructor(actor: AuthContext, permission: Permission) {
    super(`Role '${actor.role}' lacks '${permission}' permission`);
    this.name = "AccessDeniedError";
    this.details = { identity: actor.identity, role: actor.role, permission };
  }
}

/**
 * @throws {AccessDeniedError} if the actor's role lacks `permission`
 */
export function authorize(actor: AuthContext, permission: Permission): void {
  if (!hasPermission(actor.role, permission)) {
    throw new AccessDeniedError(actor, permission);
  }
}
