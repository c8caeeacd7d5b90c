/**
 * Exact set algebra over the representable integers.
 *
 * A closed integer domain evaluates to an IntervalSet: sorted, disjoint,
 * non-adjacent inclusive intervals inside [INTEGER_MIN, INTEGER_MAX]. All
 * operations are linear in the number of intervals, so sampling and
 * membership never walk value by value.
 */

import { INTEGER_MAX, INTEGER_MIN } from "./value";

// ============================================================================
// Interval Sets
// ============================================================================

export interface Interval {
  low: bigint;
  high: bigint;
}

export type IntervalSet = Interval[];

export const emptySet: IntervalSet = [];
export const fullSet: IntervalSet = [{ low: INTEGER_MIN, high: INTEGER_MAX }];

/**
 * The inclusive interval [low, high], clipped to the representable range.
 */
export function intervalSet(low: bigint, high: bigint): IntervalSet {
  const lo = low < INTEGER_MIN ? INTEGER_MIN : low;
  const hi = high > INTEGER_MAX ? INTEGER_MAX : high;
  return lo > hi ? [] : [{ low: lo, high: hi }];
}

export function pointSet(values: bigint[]): IntervalSet {
  return normalize(values.map(v => ({ low: v, high: v })));
}

/**
 * Sort and merge overlapping or adjacent intervals.
 */
function normalize(intervals: Interval[]): IntervalSet {
  const sorted = intervals
    .filter(i => i.low <= i.high)
    .sort((a, b) => (a.low < b.low ? -1 : a.low > b.low ? 1 : 0));
  const result: Interval[] = [];
  for (const i of sorted) {
    const last = result[result.length - 1];
    if (last && i.low <= last.high + 1n) {
      if (i.high > last.high) last.high = i.high;
    } else {
      result.push({ low: i.low, high: i.high });
    }
  }
  return result;
}

// ============================================================================
// Set Operations
// ============================================================================

export function unionSets(a: IntervalSet, b: IntervalSet): IntervalSet {
  return normalize([...a, ...b]);
}

export function intersectSets(a: IntervalSet, b: IntervalSet): IntervalSet {
  const result: Interval[] = [];
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const low = a[i].low > b[j].low ? a[i].low : b[j].low;
    const high = a[i].high < b[j].high ? a[i].high : b[j].high;
    if (low <= high) result.push({ low, high });
    if (a[i].high < b[j].high) i++;
    else j++;
  }
  return result;
}

/**
 * Complement relative to the representable integers.
 */
export function complementSet(a: IntervalSet): IntervalSet {
  const result: Interval[] = [];
  let next = INTEGER_MIN;
  for (const i of a) {
    if (i.low > next) result.push({ low: next, high: i.low - 1n });
    next = i.high + 1n;
  }
  if (next <= INTEGER_MAX) result.push({ low: next, high: INTEGER_MAX });
  return result;
}

export function subtractSets(a: IntervalSet, b: IntervalSet): IntervalSet {
  return intersectSets(a, complementSet(b));
}

// ============================================================================
// Queries
// ============================================================================

export function setContains(a: IntervalSet, v: bigint): boolean {
  return a.some(i => i.low <= v && v <= i.high);
}

export function setIsEmpty(a: IntervalSet): boolean {
  return a.length === 0;
}

/**
 * Number of members.
 */
export function setSize(a: IntervalSet): bigint {
  return a.reduce((n, i) => n + (i.high - i.low + 1n), 0n);
}

export function lowestMember(a: IntervalSet): bigint | undefined {
  return a.length === 0 ? undefined : a[0].low;
}

export function highestMember(a: IntervalSet): bigint | undefined {
  return a.length === 0 ? undefined : a[a.length - 1].high;
}

/**
 * The member nearest to zero; the non-negative one wins a tie.
 */
export function preferredMember(a: IntervalSet): bigint | undefined {
  let best: bigint | undefined;
  const consider = (v: bigint) => {
    if (best === undefined) {
      best = v;
      return;
    }
    const dv = v < 0n ? -v : v;
    const db = best < 0n ? -best : best;
    if (dv < db || (dv === db && v > best)) best = v;
  };
  for (const i of a) {
    if (i.low <= 0n && 0n <= i.high) return 0n;
    consider(i.low);
    consider(i.high);
  }
  return best;
}

export function setsEqual(a: IntervalSet, b: IntervalSet): boolean {
  return a.length === b.length && a.every((i, k) => i.low === b[k].low && i.high === b[k].high);
}
