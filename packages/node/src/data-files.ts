/**
 * JSON data files read at startup: the price history backing the
 * reporting-amount lookup, and the account chart seed.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { AccountRecord } from "@ledgersync/types";
import type { PriceRecord } from "@ledgersync/sanitizer";
import { CurrencyCodeSchema } from "./types/dto.js";

export const PriceRecordSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Date must be YYYY-MM-DD"),
  currency: CurrencyCodeSchema,
  rate: z.union([z.string().min(1), z.number().positive()]).transform(String),
});

export const AccountRecordSchema = z.object({
  account: z.union([z.string().min(1), z.number().int()]).transform(String),
  currency: CurrencyCodeSchema,
  description: z.string().default(""),
  taxCode: z.string().nullable().default(null),
  group: z.string().default("/"),
});

export function parsePriceHistory(json: unknown): PriceRecord[] {
  return z.array(PriceRecordSchema).parse(json);
}

export function parseAccounts(json: unknown): AccountRecord[] {
  return z.array(AccountRecordSchema).parse(json);
}

async function readJson(path: string): Promise<unknown> {
  const parsed: unknown = JSON.parse(await readFile(path, "utf8"));
  return parsed;
}

/** Price records from a JSON file, or none when no path is configured. */
export async function loadPriceHistory(path: string | undefined): Promise<PriceRecord[]> {
  return path === undefined ? [] : parsePriceHistory(await readJson(path));
}

/** Account records from a JSON file, or none when no path is configured. */
export async function loadAccounts(path: string | undefined): Promise<AccountRecord[]> {
  return path === undefined ? [] : parseAccounts(await readJson(path));
}
