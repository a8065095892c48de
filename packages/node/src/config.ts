/**
 * @shareport/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Address, Role } from "@shareport/types";
import { isAddress, isRole, ROLES } from "@shareport/types";
import { toAddress } from "@shareport/runtime";

// =============================================================================
// Schema
// =============================================================================

const THIRTY_DAYS = 30n * 24n * 60n * 60n;

/** A non-negative integer given as a decimal string, parsed to bigint. */
function uint(fallback: string) {
  return z
    .string()
    .regex(/^\d+$/, "Expected a non-negative integer")
    .default(fallback)
    .transform((value) => BigInt(value));
}

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Environment
  CHAIN_ID: z.coerce.number().int().min(1).default(31337),
  ADMIN_ADDRESS: z
    .string()
    .refine(isAddress, "ADMIN_ADDRESS must be 0x followed by 40 hex digits")
    .default("0x00000000000000000000000000000000000000a1"),

  // Asset and shares
  ASSET_SYMBOL: z.string().min(1).default("USDC"),
  ASSET_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),
  SHARE_NAME: z.string().min(1).default("Shareport Vault Shares"),
  SHARE_SYMBOL: z.string().min(1).default("spUSDC"),

  // Escrow
  DEPOSIT_EXPIRATION_SECONDS: uint("604800").refine(
    (value) => value > 0n && value <= THIRTY_DAYS,
    "DEPOSIT_EXPIRATION_SECONDS must be between 1 and 2592000",
  ),

  // Oracle
  ORACLE_INITIAL_PRICE: uint("1000000000000000000").refine(
    (value) => value > 0n,
    "ORACLE_INITIAL_PRICE must be positive",
  ),
  ORACLE_MAX_DEVIATION_BPS: uint("500").refine(
    (value) => value >= 1n && value <= 10_000n,
    "ORACLE_MAX_DEVIATION_BPS must be between 1 and 10000",
  ),
  ORACLE_PERIOD_SECONDS: uint("86400").refine(
    (value) => value > 0n,
    "ORACLE_PERIOD_SECONDS must be positive",
  ),

  // Signed withdrawals
  WITHDRAWAL_DOMAIN_NAME: z.string().min(1).default("Shareport Withdrawals"),
  WITHDRAWAL_DOMAIN_VERSION: z.string().min(1).default("1"),

  // Authorization
  ROLE_GRANTS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Role Grant Parsing
// =============================================================================

export interface RoleGrant {
  readonly account: Address;
  readonly role: Role;
}

/**
 * Parse the ROLE_GRANTS env var into structured records.
 *
 * Format: "0xaccount1:role1,0xaccount2:role2"
 */
export function parseRoleGrants(raw: string): readonly RoleGrant[] {
  if (raw.trim() === "") {
    return [];
  }

  const grants: RoleGrant[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length !== 2) {
      throw new Error(
        `Invalid ROLE_GRANTS entry: "${entry.trim()}". Expected format: account:role`,
      );
    }

    const [account = "", role = ""] = parts;

    if (!isAddress(account)) {
      throw new Error(`Invalid account "${account}" in ROLE_GRANTS`);
    }
    if (!isRole(role)) {
      throw new Error(
        `Invalid role "${role}" in ROLE_GRANTS. Must be one of: ${ROLES.join(", ")}`,
      );
    }

    grants.push({ account: toAddress(account), role });
  }

  return grants;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
