/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts may arrive as JSON numbers or strings; both become decimal
 * strings before they reach the ledger layer.
 */

import { z } from "zod";

// =============================================================================
// Shared
// =============================================================================

export const CurrencyCodeSchema = z
  .string()
  .regex(/^[A-Za-z0-9]{3,12}$/, "Currency must be 3-12 alphanumeric characters")
  .transform((value) => value.toUpperCase());

const AmountSchema = z
  .union([z.string().min(1).max(64), z.number().finite()])
  .transform(String);

const optionalText = z.string().nullish();

export const LedgerLineSchema = z.object({
  id: z.union([z.string().min(1), z.number().int()]).transform(String),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}/, "Date must start with YYYY-MM-DD"),
  account: optionalText,
  counterAccount: optionalText,
  amount: AmountSchema,
  reportingAmount: AmountSchema.nullish(),
  currency: CurrencyCodeSchema.nullish(),
  taxCode: optionalText,
  description: optionalText,
  document: optionalText,
});

export const LinesSchema = z.array(LedgerLineSchema).max(50_000);

// =============================================================================
// Sanitization
// =============================================================================

export const SanitizeRequestSchema = z.object({
  lines: LinesSchema,
  reportingCurrency: CurrencyCodeSchema.optional(),
  transitoryAccount: z.string().trim().min(1).optional(),
});

export const ResolveRateRequestSchema = z.object({
  lines: LinesSchema.min(1),
  mode: z.enum(["strict", "lenient"]).default("strict"),
});

export const JournalPreviewRequestSchema = z.object({
  lines: LinesSchema,
});

// =============================================================================
// Transitory account
// =============================================================================

export const TransitoryAccountRequestSchema = z.object({
  account: z.string().trim().min(1),
});

// =============================================================================
// Inferred types
// =============================================================================

export type LedgerLineDto = z.infer<typeof LedgerLineSchema>;
export type SanitizeRequestDto = z.infer<typeof SanitizeRequestSchema>;
export type ResolveRateRequestDto = z.infer<typeof ResolveRateRequestSchema>;
export type JournalPreviewRequestDto = z.infer<typeof JournalPreviewRequestSchema>;
export type TransitoryAccountRequestDto = z.infer<typeof TransitoryAccountRequestSchema>;
