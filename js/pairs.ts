import { Result, ok, malformed, unwrap } from './result';

/**
 * Unordered pair of distinct sequence indices, held as (lo, hi) with lo < hi.
 * Only obtainable through IndexPair.of, so a self-pair or a reversed pair
 * never exists past construction.
 */
export class IndexPair {
  private constructor(readonly lo: number, readonly hi: number) {}

  static of(a: number, b: number): Result<IndexPair> {
    if (!Number.isInteger(a) || !Number.isInteger(b)) {
      return malformed(`pair indices must be integers, got (${a}, ${b})`);
    }
    if (a < 0 || b < 0) {
      return malformed(`pair indices must be non-negative, got (${a}, ${b})`);
    }
    if (a === b) {
      return malformed(`self-pair (${a}, ${b})`);
    }
    return ok(a < b ? new IndexPair(a, b) : new IndexPair(b, a));
  }

  get key(): string {
    return pairKey(this.lo, this.hi);
  }

  equals(other: IndexPair): boolean {
    return this.lo === other.lo && this.hi === other.hi;
  }

  toTuple(): [number, number] {
    return [this.lo, this.hi];
  }
}

export function pairKey(a: number, b: number): string {
  return a < b ? `${a},${b}` : `${b},${a}`;
}

/** All pairs (i, j), i < j, over [0, n), in lexicographic order. */
export function enumeratePairs(n: number): IndexPair[] {
  const pairs: IndexPair[] = [];
  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      pairs.push(unwrap(IndexPair.of(i, j)));
    }
  }
  return pairs;
}
