/**
 * @ledgersync/node: Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";
import { CurrencyPrecision } from "@ledgersync/ledger";

// =============================================================================
// Schema
// =============================================================================

const INCREMENT_PATTERN = /^\d+(\.\d+)?$/;

const IncrementSchema = z
  .string()
  .trim()
  .regex(INCREMENT_PATTERN, "Must be a positive decimal")
  .refine((value) => /[1-9]/.test(value), "Must be greater than zero");

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Ledger
  REPORTING_CURRENCY: z
    .string()
    .regex(/^[A-Z]{3,5}$/, "Must be 3-5 upper-case letters")
    .default("CHF"),
  TRANSITORY_ACCOUNT: z.string().trim().min(1).optional(),

  // Precision
  DEFAULT_PRECISION: IncrementSchema.default("0.01"),
  CURRENCY_PRECISION: z.string().default(""),
  ROUNDING_MODE: z.enum(["half-even", "half-up"]).default("half-even"),

  // Data files
  PRICE_HISTORY_FILE: z.string().min(1).optional(),
  ACCOUNTS_FILE: z.string().min(1).optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Currency Precision Parsing
// =============================================================================

const CURRENCY_PATTERN = /^[A-Za-z0-9]{3,12}$/;

/**
 * Parse the CURRENCY_PRECISION env var into per-currency increments.
 *
 * Format: "JPY:1,CHF:0.01"
 */
export function parseCurrencyPrecision(raw: string): Readonly<Record<string, string>> {
  if (raw.trim() === "") {
    return {};
  }

  const increments: Record<string, string> = {};

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [currency, increment] = parts;
    if (parts.length !== 2 || currency === undefined || increment === undefined) {
      throw new Error(
        `Invalid CURRENCY_PRECISION entry: "${entry.trim()}". Expected format: CURRENCY:increment`,
      );
    }

    const code = currency.trim().toUpperCase();
    if (!CURRENCY_PATTERN.test(code)) {
      throw new Error(`Invalid currency "${currency.trim()}" in CURRENCY_PRECISION`);
    }
    const parsed = IncrementSchema.safeParse(increment);
    if (!parsed.success) {
      throw new Error(
        `Invalid increment "${increment.trim()}" for ${code} in CURRENCY_PRECISION. ` +
          "Must be a positive decimal",
      );
    }
    if (code in increments) {
      throw new Error(`Currency ${code} is listed twice in CURRENCY_PRECISION`);
    }

    increments[code] = parsed.data;
  }

  return increments;
}

/** Precision table described by the configuration. */
export function buildPrecision(config: AppConfig): CurrencyPrecision {
  return new CurrencyPrecision({
    defaultPrecision: config.DEFAULT_PRECISION,
    currencies: parseCurrencyPrecision(config.CURRENCY_PRECISION),
    roundingMode: config.ROUNDING_MODE,
  });
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
