const MS_PER_SECOND = 1_000;

/**
 * Absolute expiry for a batch whose TTL was read at `now`.
 * Returns undefined for a TTL that is missing, not an integer, or negative;
 * such a batch is still a valid record, just one without a known expiry.
 */
export function computeExpiration(
  ttlSeconds: unknown,
  now: Date,
): Date | undefined {
  if (
    typeof ttlSeconds !== "number" ||
    !Number.isSafeInteger(ttlSeconds) ||
    ttlSeconds < 0
  ) {
    return undefined;
  }

  const nowSeconds = Math.floor(now.getTime() / MS_PER_SECOND);
  const expiresAt = new Date((nowSeconds + ttlSeconds) * MS_PER_SECOND);
  // Past the representable Date range.
  return Number.isNaN(expiresAt.getTime()) ? undefined : expiresAt;
}

/**
 * ISO-8601 in UTC at whole-second precision: `2024-01-01T00:01:40Z`.
 */
export function formatIsoSeconds(date: Date): string {
  return `${date.toISOString().slice(0, 19)}Z`;
}

/**
 * `YYYY-MM-DD-HH-MM` in UTC, the format older dashboards read.
 */
export function formatLegacyExpiration(date: Date): string {
  const year = date.getUTCFullYear();
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  const hour = String(date.getUTCHours()).padStart(2, "0");
  const minute = String(date.getUTCMinutes()).padStart(2, "0");
  return `${year}-${month}-${day}-${hour}-${minute}`;
}
