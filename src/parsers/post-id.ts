const STATUS_ID_FROM_URL = /\/status(?:es)?\/(\d+)/;
const NUMERIC_ID = /^\d+$/;

/**
 * Extract a status id from a user-provided string.
 * Accepts: raw numeric ID, any URL containing /status/<id>.
 */
export function extractPostId(input: string): string | null {
  const trimmed = input.trim();
  if (NUMERIC_ID.test(trimmed)) return trimmed;

  const match = trimmed.match(STATUS_ID_FROM_URL);
  return match ? match[1] : null;
}

/**
 * Order two platform ids. Purely numeric ids compare by value, anything else lexicographically.
 */
export function compareIds(a: string, b: string): number {
  if (NUMERIC_ID.test(a) && NUMERIC_ID.test(b)) {
    const left = BigInt(a);
    const right = BigInt(b);
    return left === right ? 0 : left > right ? 1 : -1;
  }
  return a === b ? 0 : a > b ? 1 : -1;
}
