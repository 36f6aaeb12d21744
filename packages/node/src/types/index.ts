/**
 * Type barrel — re-exports all public types from @feedguard/node.
 */

// DTOs
export {
  SetConfigSchema,
  ToggleConfigSchema,
  UsersSchema,
  VerifyReportSchema,
  AuditQuerySchema,
} from "./dto.js";
export type {
  SetConfigDto,
  ToggleConfigDto,
  UsersDto,
  VerifyReportDto,
  AuditQueryDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLES, ROLE_PERMISSIONS, hasPermission, isRole } from "./auth.js";
export type {
  Role,
  Permission,
  AuthContext,
  ApiKeyRecord,
  JwtClaims,
} from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
