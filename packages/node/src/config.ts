/**
 * @quorumkit/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { getAddress, isAddress, isHex, type Address, type Hex } from "viem";
import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

const AddressString = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), { message: "Expected a 20-byte hex address" })
  .transform((v) => getAddress(v));

export const ConfigSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    HOST: z.string().default("0.0.0.0"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace"])
      .default("info"),
    NODE_ENV: z
      .enum(["development", "production", "test"])
      .default("development"),

    // Module domain
    MULTISIG_NAME: z.string().min(1).default("quorumkit"),
    CHAIN_ID: z.coerce.number().int().min(1).default(31337),
    MODULE_ADDRESS: AddressString,

    // Governance at genesis
    SIGNERS: z.string().default(""),
    QUORUM: z.coerce.number().int().min(0),

    // External calls
    EXECUTOR: z.enum(["dispatch", "rpc"]).default("dispatch"),
    RPC_URL: z.string().url().optional(),
    EXECUTOR_PRIVATE_KEY: z
      .custom<Hex>((v) => typeof v === "string" && isHex(v, { strict: true }) && v.length === 66, {
        message: "Expected a 32-byte hex key",
      })
      .optional(),
  })
  .superRefine((config, ctx) => {
    if (config.EXECUTOR !== "rpc") {
      return;
    }
    if (config.RPC_URL === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["RPC_URL"],
        message: "RPC_URL is required when EXECUTOR=rpc",
      });
    }
    if (config.EXECUTOR_PRIVATE_KEY === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["EXECUTOR_PRIVATE_KEY"],
        message: "EXECUTOR_PRIVATE_KEY is required when EXECUTOR=rpc",
      });
    }
  });

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Signer List Parsing
// =============================================================================

/**
 * Parse the SIGNERS env var into checksummed addresses.
 *
 * Format: "0xabc...,0xdef..."
 */
export function parseSignerList(raw: string): readonly Address[] {
  if (raw.trim() === "") {
    return [];
  }

  const signers: Address[] = [];

  for (const entry of raw.split(",")) {
    const value = entry.trim();
    if (value === "") {
      throw new Error(`Invalid SIGNERS list: empty entry in "${raw.trim()}"`);
    }
    if (!isAddress(value, { strict: false })) {
      throw new Error(`Invalid SIGNERS entry: "${value}" is not an address`);
    }
    signers.push(getAddress(value));
  }

  return signers;
}

/**
 * Startup warnings for a governance configuration that can never, or
 * always, authorize. Duplicate SIGNERS entries count once.
 */
export function quorumWarnings(quorum: number, signers: readonly Address[]): string[] {
  const distinct = new Set(signers).size;
  const warnings: string[] = [];
  if (quorum > distinct) {
    warnings.push(
      `Quorum ${quorum} exceeds the ${distinct} distinct signer(s); no action can ever be authorized`,
    );
  }
  if (quorum === 0) {
    warnings.push("Quorum is 0; every action is authorized without signatures");
  }
  return warnings;
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
