/**
 * Environment-based configuration with Zod validation.
 *
 * List values are comma separated. API keys are `key:address` pairs; the
 * address is the actor every request made with that key acts as.
 */

import { z } from "zod";
import type { YieldSplitServiceConfig } from "./services/yieldsplit-service.js";

const csv = z
  .string()
  .default("")
  .transform((raw) => parseAddressList(raw));

const bps = z.coerce.number().int().min(0).max(10_000);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]).default("info"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

  API_KEYS: z.string().optional(),

  CUSTODY_ADDRESS: z.string().min(1).default("yieldsplit-custody"),
  FEE_RECIPIENT: z.string().min(1),
  PROTOCOL_TREASURY: z.string().min(1),
  FEE_BPS: bps.default(100),
  FEE_BPS_CEILING: bps.default(1_000),
  PROTOCOL_FEE_BPS: bps.default(0),
  ACCEPTED_SPLITS: z
    .string()
    .default("50,75,100")
    .transform((raw, ctx) => {
      const values = raw.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
      const parsed = values.map(Number);
      if (parsed.length === 0 || parsed.some((n) => !Number.isInteger(n))) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected comma-separated integers" });
        return z.NEVER;
      }
      return parsed;
    }),

  FEE_ADMINS: csv,
  CALLER_ADMINS: csv,
  EMERGENCY_ADMINS: csv,
  PAUSERS: csv,
  AUTHORIZED_CALLERS: csv,
  APPROVED_BENEFICIARIES: csv,
  DEFAULT_BENEFICIARY: z.string().min(1).optional(),

  AUDIT_LOG_PATH: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Load and validate configuration from environment variables.
 *
 * @throws ZodError if required variables are missing or malformed
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Parse `API_KEYS` into a key → actor map.
 *
 * Format: "key1:0xabc,key2:0xdef"
 *
 * @throws Error on a malformed entry or a repeated key
 */
export function parseApiKeys(raw: string): Map<string, string> {
  const keys = new Map<string, string>();
  const trimmed = raw.trim();
  if (trimmed === "") return keys;

  for (const entry of trimmed.split(",")) {
    const parts = entry.trim().split(":");
    if (parts.length !== 2) {
      throw new Error(`Invalid API_KEYS entry: "${entry.trim()}". Expected key:address`);
    }
    const [key = "", actor = ""] = parts.map((p) => p.trim());
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (actor === "") {
      throw new Error(`Actor address cannot be empty for key "${key}"`);
    }
    if (keys.has(key)) {
      throw new Error(`Duplicate API key "${key}"`);
    }
    keys.set(key, actor);
  }
  return keys;
}

/**
 * Split a comma-separated address list, dropping blanks and repeats.
 */
export function parseAddressList(raw: string): string[] {
  const seen = new Set<string>();
  for (const part of raw.split(",")) {
    const address = part.trim();
    if (address.length > 0) seen.add(address);
  }
  return [...seen];
}

/**
 * Map validated environment configuration onto the service.
 */
export function toServiceConfig(config: AppConfig): YieldSplitServiceConfig {
  return {
    custodyAddress: config.CUSTODY_ADDRESS,
    fees: {
      feeRecipient: config.FEE_RECIPIENT,
      feeBps: config.FEE_BPS,
      feeBpsCeiling: config.FEE_BPS_CEILING,
      protocolTreasury: config.PROTOCOL_TREASURY,
      protocolFeeBps: config.PROTOCOL_FEE_BPS,
    },
    roles: {
      "fee-admin": config.FEE_ADMINS,
      "caller-admin": config.CALLER_ADMINS,
      "emergency-admin": config.EMERGENCY_ADMINS,
      pauser: config.PAUSERS,
    },
    authorizedCallers: config.AUTHORIZED_CALLERS,
    acceptedSplits: config.ACCEPTED_SPLITS,
    approvedBeneficiaries: config.APPROVED_BENEFICIARIES,
    defaultBeneficiary: config.DEFAULT_BENEFICIARY,
    auditLogPath: config.AUDIT_LOG_PATH,
  };
}
