// ── Transaction Merging ─────────────────────────────────────────────
// One deterministic ascending sequence from persisted one-offs and
// projected occurrences.

import type {
  OneOffTransaction,
  Occurrence,
  PersistedOccurrence,
} from "./types.js";

export function persistedOccurrence(tx: OneOffTransaction): PersistedOccurrence {
  return {
    kind: "persisted",
    id: tx.id,
    date: tx.date,
    amount: tx.amount,
    description: tx.description,
    direction: tx.direction,
  };
}

/**
 * Merge one-offs with projected occurrences.
 *
 * Ordered by date, then by description (case-sensitive, Unicode code
 * point order, which matches UTF-8 byte order). Equal (date,
 * description) pairs keep input order, one-offs first. Neither input
 * is mutated.
 */
export function mergeOccurrences(
  oneOffs: readonly OneOffTransaction[],
  projected: readonly Occurrence[],
): Occurrence[] {
  const all: Occurrence[] = [...oneOffs.map(persistedOccurrence), ...projected];
  // Array.prototype.sort is stable
  return all.sort(compareOccurrences);
}

export function compareOccurrences(a: Occurrence, b: Occurrence): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  return compareCodePoints(a.description, b.description);
}

function compareCodePoints(a: string, b: string): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a.charCodeAt(i);
    const y = b.charCodeAt(i);
    if (x !== y) {
      // A surrogate pair outranks every BMP character, even U+E000-U+FFFF
      const cx = a.codePointAt(i) ?? x;
      const cy = b.codePointAt(i) ?? y;
      return cx < cy ? -1 : 1;
    }
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}
