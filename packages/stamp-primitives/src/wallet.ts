import { z } from "zod";
import { toValidationIssues, ValidationError } from "./errors.ts";
import type { ChequebookInfo, WalletInfo } from "./types.ts";

const balanceField = z.string().nullable().catch(null);

const walletSchema = z.object({
  walletAddress: z.string().min(1),
  bzzBalance: balanceField,
});

const chequebookAddressSchema = z.object({
  chequebookAddress: z.string().min(1),
});

const chequebookBalanceSchema = z.object({
  availableBalance: balanceField,
  totalBalance: balanceField,
});

function parseOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  raw: unknown,
  what: string,
): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    throw new ValidationError(
      `invalid ${what} response: ${JSON.stringify(issues)}`,
      issues,
    );
  }
  return result.data;
}

export function buildWalletInfo(raw: unknown): WalletInfo {
  return parseOrThrow(walletSchema, raw, "wallet");
}

/**
 * Bee splits the chequebook across two endpoints; the balance response may
 * be missing or partial without failing the whole answer.
 */
export function buildChequebookInfo(
  rawAddress: unknown,
  rawBalance: unknown,
): ChequebookInfo {
  const { chequebookAddress } = parseOrThrow(
    chequebookAddressSchema,
    rawAddress,
    "chequebook address",
  );
  const balance = chequebookBalanceSchema.safeParse(rawBalance);
  return {
    chequebookAddress,
    availableBalance: balance.success ? balance.data.availableBalance : null,
    totalBalance: balance.success ? balance.data.totalBalance : null,
  };
}
