import {
  buildStampRecord,
  computeExpiration,
  decodeEnvelope,
  isGatewayError,
  resolveStamp,
  type StampRecord,
} from "@stamp-gateway/stamp-primitives";
import type { Logger } from "pino";
import { BEE_PATHS, type BeeClient, type RequestOptions } from "./bee-client.ts";

export type PipelineStage =
  | "fetching"
  | "normalizing"
  | "resolving"
  | "computing"
  | "building";

export interface StampServiceOptions {
  client: BeeClient;
  logger: Logger;
  /**
   * Source of "now" for expiration math. Read once per lookup, right after
   * the upstream fetch completes.
   */
  clock?: () => Date;
}

/**
 * Stamp lookup pipeline. Every call fetches the full batch list again;
 * nothing survives between calls.
 */
export class StampService {
  private readonly client: BeeClient;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: StampServiceOptions) {
    this.client = options.client;
    this.logger = options.logger;
    this.clock = options.clock ?? (() => new Date());
  }

  async getStamp(
    batchId: string,
    options: RequestOptions = {},
  ): Promise<StampRecord> {
    let stage: PipelineStage = "fetching";
    try {
      const raw = await this.client.fetchAllStamps(options);
      const now = this.clock();

      stage = "normalizing";
      const { shape, stamps } = decodeEnvelope(raw);
      this.logger.debug(
        { shape, count: stamps.length },
        "decoded stamp envelope",
      );

      stage = "resolving";
      const stamp = resolveStamp(stamps, batchId);

      stage = "computing";
      const expiresAt = computeExpiration(stamp.batchTTL, now);

      stage = "building";
      return buildStampRecord(stamp, expiresAt);
    } catch (error) {
      this.logFailure(error, stage, { batchId });
      throw error;
    }
  }

  /**
   * Every stamp on the node. Records that fail validation are skipped.
   */
  async listStamps(options: RequestOptions = {}): Promise<StampRecord[]> {
    let stage: PipelineStage = "fetching";
    try {
      const raw = await this.client.fetchAllStamps(options);
      const now = this.clock();

      stage = "normalizing";
      const { stamps } = decodeEnvelope(raw);

      stage = "building";
      const records: StampRecord[] = [];
      for (const [index, stamp] of stamps.entries()) {
        try {
          records.push(
            buildStampRecord(stamp, computeExpiration(stamp.batchTTL, now)),
          );
        } catch (error) {
          if (!isGatewayError(error)) {
            throw error;
          }
          this.logger.warn(
            { index, kind: error.kind, error: error.message },
            "skipping invalid stamp record",
          );
        }
      }
      return records;
    } catch (error) {
      this.logFailure(error, stage, {});
      throw error;
    }
  }

  private logFailure(
    error: unknown,
    stage: PipelineStage,
    context: { batchId?: string },
  ): void {
    const upstreamUrl = this.client.urlFor(BEE_PATHS.batches);
    if (!isGatewayError(error)) {
      this.logger.error(
        { err: error, stage, upstreamUrl, ...context },
        "stamp pipeline failed unexpectedly",
      );
      return;
    }

    const fields = {
      kind: error.kind,
      status: error.status,
      stage,
      upstreamUrl,
      ...context,
      error: error.message,
    };
    if (error.status >= 500) {
      this.logger.error(fields, "stamp pipeline failed");
    } else {
      this.logger.info(fields, "stamp pipeline failed");
    }
  }
}
