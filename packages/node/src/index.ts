/**
 * @feedguard/node — HTTP service for oracle configuration curation,
 * snapshot distribution and report verification.
 */

export { OracleService } from "./services/oracle-service.js";
export type {
  OracleServiceOptions,
  ConfigMutationResult,
  DistributionResult,
} from "./services/oracle-service.js";
export { AuditLog } from "./services/audit-log.js";
export type {
  AuditAction,
  AuditLogEntry,
  AuditLogQuery,
  AuditResourceType,
} from "./services/audit-log.js";
export { AccessDeniedError, authorize } from "./services/policy.js";
export { loadConfig, parseApiKeys, buildAuthConfig, ConfigSchema } from "./config.js";
export type { AppConfig, ParsedApiKey } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./types/index.js";
