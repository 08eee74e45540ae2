import { z } from "zod";
import { NormalizationError } from "./errors.ts";
import {
  type EnvelopeKey,
  type EnvelopeShape,
  type RawStampObject,
  STAMP_ENVELOPE_KEYS,
} from "./types.ts";

const rawStampListSchema = z.array(z.record(z.string(), z.unknown()));

type EnvelopeDecoder = z.ZodType<RawStampObject[], z.ZodTypeDef, unknown>;

const WRAPPED_DECODERS = {
  stamps: z
    .object({ stamps: rawStampListSchema })
    .transform((envelope) => envelope.stamps),
  batches: z
    .object({ batches: rawStampListSchema })
    .transform((envelope) => envelope.batches),
} satisfies Record<EnvelopeKey, EnvelopeDecoder>;

// Tried in order; the first variant that decodes wins.
const ENVELOPE_DECODERS: ReadonlyArray<[EnvelopeShape, EnvelopeDecoder]> = [
  ["bare", rawStampListSchema],
  ...STAMP_ENVELOPE_KEYS.map(
    (key): [EnvelopeShape, EnvelopeDecoder] => [key, WRAPPED_DECODERS[key]],
  ),
];

export interface DecodedEnvelope {
  shape: EnvelopeShape;
  stamps: RawStampObject[];
}

export function decodeEnvelope(raw: unknown): DecodedEnvelope {
  for (const [shape, decoder] of ENVELOPE_DECODERS) {
    const result = decoder.safeParse(raw);
    if (result.success) {
      return { shape, stamps: result.data };
    }
  }

  throw new NormalizationError(
    "unrecognized-envelope",
    `unrecognized stamp envelope: expected a list or an object with one of [${STAMP_ENVELOPE_KEYS.join(", ")}], got ${describeValue(raw)}`,
  );
}

/**
 * Erases the difference between a bare stamp list and a wrapped one.
 * Upstream order is kept; records are not touched.
 */
export function normalizeEnvelope(raw: unknown): RawStampObject[] {
  return decodeEnvelope(raw).stamps;
}

function describeValue(raw: unknown): string {
  if (raw === null) {
    return "null";
  }
  if (Array.isArray(raw)) {
    return "a list with non-object entries";
  }
  if (typeof raw === "object") {
    const keys = Object.keys(raw);
    return keys.length > 0 ? `an object with keys [${keys.join(", ")}]` : "an empty object";
  }
  return typeof raw;
}
