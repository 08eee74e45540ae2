/**
 * A stamp batch exactly as the Bee node reported it. Fields are not
 * interpreted until {@link StampRecord} is built from it.
 */
export type RawStampObject = Record<string, unknown>;

export interface StampRecord {
  batchID: string;
  utilization: number;
  usable: boolean;
  label: string | null;
  depth: number;
  /**
   * Large integer kept as text; JSON numbers lose precision past 2^53.
   */
  amount: string | null;
  bucketDepth: number;
  blockNumber: number;
  immutableFlag: boolean;
  exists: boolean;
  /**
   * Remaining lifetime in seconds at fetch time, as reported upstream.
   */
  batchTTL: number | null;
  /**
   * Derived from `batchTTL` and the fetch instant, never read from upstream.
   */
  expiresAt: Date | null;
}

export interface StampRecordJson
  extends Omit<StampRecord, "expiresAt"> {
  expiresAt: string | null;
  expectedExpiration: string | null;
}

export interface WalletInfo {
  walletAddress: string;
  bzzBalance: string | null;
}

export interface ChequebookInfo {
  chequebookAddress: string;
  availableBalance: string | null;
  totalBalance: string | null;
}

/**
 * Wrapper keys probed, in priority order, when the node answers with an
 * object instead of a bare list.
 */
export const STAMP_ENVELOPE_KEYS = ["stamps", "batches"] as const;

export type EnvelopeKey = (typeof STAMP_ENVELOPE_KEYS)[number];

export type EnvelopeShape = "bare" | EnvelopeKey;

export const DEFAULT_INTEGER_FIELD = 0;
