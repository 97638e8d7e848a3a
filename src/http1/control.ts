/**
 * Request control headers understood by the pipelining server.
 */

/** Delay, in milliseconds, before the reply to this request may be written */
export const SLEEP_HEADER = "X-Sleep";

/** Request id echoed back in the reply */
export const REQUEST_ID_HEADER = "X-Request";

/**
 * Parse an unsigned decimal control value the way strtoul(value, NULL, 10)
 * does: leading whitespace and a "+" are skipped, then the longest run of
 * digits is read. No digits at all yields 0.
 */
export function parseControlValue(value: string): number {
  const match = /^\s*\+?(\d+)/.exec(value);
  if (!match) return 0;
  const parsed = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(parsed) ? parsed : Number.MAX_SAFE_INTEGER;
}

/** Control header names compare case-insensitively, like any HTTP field name */
export function isControlHeader(key: string, name: string): boolean {
  return key.length === name.length && key.toLowerCase() === name.toLowerCase();
}
