/**
 * Canonical UTC timestamp formatting.
 *
 * Format: `YYYY-MM-DDTHH:MM:SS.mmmZ`
 */

/**
 * Return the current UTC time as an ISO 8601 string with Z suffix.
 */
export function utcNow(): string {
  return new Date().toISOString();
}
