/**
 * Thread ids double as file basenames, so they are restricted to a
 * path-safe alphabet: 1..128 chars, first [A-Za-z0-9], then [A-Za-z0-9_-].
 */
const SAFE_ID_RE = /^[A-Za-z0-9][A-Za-z0-9_-]{0,127}$/;

export function isSafeId(id: string): boolean {
  return SAFE_ID_RE.test(id);
}

export function assertSafeId(label: string, id: string): void {
  if (!isSafeId(id)) {
    throw new Error(
      `Invalid ${label}: ${JSON.stringify(id)} (expected 1..128 chars: first [A-Za-z0-9], then [A-Za-z0-9_-])`
    );
  }
}
