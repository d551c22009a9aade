import { CountMap } from "../types";

/**
 * Returns the entries of `a` that are ahead of `b`: keys missing from `b`, or
 * whose count in `a` is strictly greater. A missing `b` means everything in
 * `a` is new; a missing `a` carries no new information and yields `b`.
 *
 * Decreases are never reported.
 */
export function diffCounts(a: CountMap | undefined, b: CountMap | undefined): CountMap {
  if (!b) {
    return { ...(a ?? {}) };
  }
  if (!a) {
    return { ...b };
  }

  const ahead: CountMap = {};
  for (const [key, count] of Object.entries(a)) {
    if (!Object.prototype.hasOwnProperty.call(b, key) || count > b[key]) {
      ahead[key] = count;
    }
  }
  return ahead;
}

export function isEmptyCounts(counts: CountMap): boolean {
  return Object.keys(counts).length === 0;
}
