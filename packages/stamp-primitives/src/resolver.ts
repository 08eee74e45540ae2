import { NotFoundError } from "./errors.ts";
import type { RawStampObject } from "./types.ts";

/**
 * Linear scan over the node's full stamp list. The node offers no
 * server-side filter, so there is nothing better to do than O(n).
 * Duplicate IDs resolve to the first one in upstream order.
 */
export function resolveStamp(
  stamps: readonly RawStampObject[],
  batchId: string,
): RawStampObject {
  const match = stamps.find((stamp) => stamp.batchID === batchId);
  if (!match) {
    throw new NotFoundError(batchId);
  }
  return match;
}
