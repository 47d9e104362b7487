/**
 * @vestline/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import type { Address } from "@vestline/types";
import { isAddress } from "@vestline/types";
import { AddressSchema } from "./types/dto.js";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Identities
  ADMIN_ADDRESS: AddressSchema,
  ENGINE_ADDRESS: AddressSchema.default("0x00000000000000000000000000000000000e0001"),
  LEDGER_ADDRESS: AddressSchema.default("0x00000000000000000000000000000000000a0001"),

  // Token
  TOKEN_SYMBOL: z.string().min(1).max(16).default("VEST"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(36).default(18),
  TOKEN_MAX_SUPPLY: z
    .string()
    .regex(/^[1-9]\d*$/, "TOKEN_MAX_SUPPLY must be a positive integer")
    .transform((value) => BigInt(value))
    .default("1000000000000000000000000000"),
}).superRefine((config, ctx) => {
  // Without keys the caller comes from an unauthenticated header
  if (config.NODE_ENV === "production" && config.API_KEYS.trim() === "") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["API_KEYS"],
      message: "API_KEYS must be set when NODE_ENV=production",
    });
  }
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  /** The ledger caller every request with this key acts as. */
  readonly address: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:0xaddress1,key2:0xaddress2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];
  const seen = new Set<string>();

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, rawAddress] = parts;
    if (parts.length !== 2 || key === undefined || rawAddress === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (seen.has(key)) {
      throw new Error(`Duplicate API key in API_KEYS: "${key}"`);
    }
    const address = rawAddress.toLowerCase();
    if (!isAddress(address)) {
      throw new Error(`Invalid address "${rawAddress}" in API_KEYS`);
    }

    seen.add(key);
    keys.push({ key, address });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
