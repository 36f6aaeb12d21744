/**
 * Authentication and authorization types.
 *
 * Supports two auth strategies:
 * 1. API key via X-Api-Key header
 * 2. JWT bearer token via Authorization header
 *
 * Roles:
 * - admin: curates oracle configurations and distributes snapshots
 * - consumer: verifies reports against the snapshot distributed to it
 */

// =============================================================================
// Roles & Permissions
// =============================================================================

export const ROLES = ["admin", "consumer"] as const;

export type Role = (typeof ROLES)[number];

export type Permission = "read" | "configure" | "distribute" | "verify";

/** Which permissions each role grants */
export const ROLE_PERMISSIONS: Record<Role, readonly Permission[]> = {
  admin: ["read", "configure", "distribute"],
  consumer: ["verify"],
};

export function isRole(value: string): value is Role {
  return (ROLES as readonly string[]).includes(value);
}

/**
 * Check whether a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

// =============================================================================
// Auth Context
// =============================================================================

/**
 * Resolved authentication context, set by the auth middleware.
 *
 * `identity` is the user ID snapshot handles are issued to.
 */
export interface AuthContext {
  readonly type: "api-key" | "jwt";
  readonly identity: string;
  readonly role: Role;
}

// =============================================================================
// API Key Record
// =============================================================================

export interface ApiKeyRecord {
  readonly key: string;
  readonly role: Role;
  readonly identity: string;
}

// =============================================================================
// JWT Claims
// =============================================================================

export interface JwtClaims {
  readonly sub: string;
  readonly role: Role;
  readonly iss: string;
  readonly exp: number;
  readonly iat: number;
}
