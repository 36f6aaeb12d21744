/**
 * Request DTOs with Zod validation schemas.
 *
 * Schemas check shape only. Domain rules (key lengths, signer bounds, ...)
 * are enforced by the registry so that they report their own error codes.
 */

import { z } from "zod";

// =============================================================================
// Config DTOs
// =============================================================================

const ExpectedVersion = z.number().int().min(0).optional();

export const SetConfigSchema = z.object({
  signers: z.array(z.string().min(1)),
  f: z.number(),
  expectedVersion: ExpectedVersion,
});

export type SetConfigDto = z.infer<typeof SetConfigSchema>;

/** Body of activate / deactivate; may be omitted entirely */
export const ToggleConfigSchema = z
  .object({ expectedVersion: ExpectedVersion })
  .default({});

export type ToggleConfigDto = z.infer<typeof ToggleConfigSchema>;

// =============================================================================
// Distribution DTOs
// =============================================================================

export const UsersSchema = z.object({
  users: z.array(z.string().min(1).max(256)).min(1),
});

export type UsersDto = z.infer<typeof UsersSchema>;

// =============================================================================
// Report DTOs
// =============================================================================

export const VerifyReportSchema = z.object({
  /** Hex-encoded signed report, `0x` prefix optional */
  report: z.string().min(1),
  /** Snapshot the caller believes it holds; must be current if given */
  snapshotId: z.string().min(1).optional(),
});

export type VerifyReportDto = z.infer<typeof VerifyReportSchema>;

// =============================================================================
// Audit DTOs
// =============================================================================

export const AuditQuerySchema = z.object({
  actor: z.string().optional(),
  action: z.string().optional(),
  resourceType: z.string().optional(),
  resourceId: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type AuditQueryDto = z.infer<typeof AuditQuerySchema>;
