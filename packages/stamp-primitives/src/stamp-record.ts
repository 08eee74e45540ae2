import { z } from "zod";
import { toValidationIssues, ValidationError } from "./errors.ts";
import { formatIsoSeconds, formatLegacyExpiration } from "./expiration.ts";
import {
  DEFAULT_INTEGER_FIELD,
  type RawStampObject,
  type StampRecord,
  type StampRecordJson,
} from "./types.ts";

const integerField = z.number().int().catch(DEFAULT_INTEGER_FIELD);
const flagField = z.boolean().catch(false);

// Bee reports amounts as decimal strings; older nodes sent plain numbers.
// BigInt keeps integers past 1e21 in plain digits instead of exponent form.
const amountField = z
  .union([
    z.string(),
    z
      .number()
      .int()
      .transform((value) => BigInt(value).toString()),
  ])
  .nullable()
  .catch(null);

// Only batchID can fail; everything else falls back to a default.
const rawStampSchema = z.object({
  batchID: z.string().min(1, "batchID must be a non-empty string"),
  utilization: integerField,
  usable: flagField,
  label: z.string().nullable().catch(null),
  depth: integerField,
  amount: amountField,
  bucketDepth: integerField,
  blockNumber: integerField,
  immutableFlag: flagField,
  exists: flagField,
  batchTTL: z.number().int().nullable().catch(null),
});

export function buildStampRecord(
  raw: RawStampObject,
  expiresAt?: Date,
): StampRecord {
  const result = rawStampSchema.safeParse(raw);
  if (!result.success) {
    const issues = toValidationIssues(result.error);
    throw new ValidationError(
      `invalid stamp record: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join("; ")}`,
      issues,
    );
  }

  return {
    ...result.data,
    expiresAt: expiresAt ?? null,
  };
}

export function serializeStampRecord(record: StampRecord): StampRecordJson {
  const { expiresAt, ...fields } = record;
  return {
    ...fields,
    expiresAt: expiresAt ? formatIsoSeconds(expiresAt) : null,
    expectedExpiration: expiresAt ? formatLegacyExpiration(expiresAt) : null,
  };
}
