/**
 * @shareport/node — Composition root.
 *
 * - loadConfig / parseRoleGrants: environment configuration (zod)
 * - createLogger: structured logging (pino)
 * - toErrorEnvelope: uniform failure shape
 * - ShareportService: every component wired into one environment
 */

export { ConfigSchema, loadConfig, parseRoleGrants } from "./config.js";
export type { AppConfig, RoleGrant } from "./config.js";

export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export { createErrorEnvelope, toErrorEnvelope } from "./errors.js";
export type { ErrorDetail, ErrorEnvelope } from "./errors.js";

export { ShareportService, deriveAddresses } from "./services/shareport-service.js";
export type { ShareportAddresses, ShareportStatus } from "./services/shareport-service.js";

export { bootstrap } from "./bootstrap.js";
export type { Shareport } from "./bootstrap.js";
