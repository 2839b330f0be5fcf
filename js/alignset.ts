import { IndexPair, pairKey } from './pairs';
import { PairwiseAlignment } from './pairalign';

export interface AlignmentEntry {
  pair: IndexPair;
  alignment: PairwiseAlignment;
}

/** Untyped form of an entry, as read from JSON: [[i, j], [rowA, rowB]]. */
export type RawAlignmentEntry = [[number, number], [string, string]];

/** Alignments keyed by canonical index pair. Each pair may be added once. */
export class AlignmentSet {
  private byKey = new Map<string, AlignmentEntry>();

  get size(): number {
    return this.byKey.size;
  }

  add(pair: IndexPair, alignment: PairwiseAlignment): boolean {
    if (this.byKey.has(pair.key)) {
      return false;
    }
    this.byKey.set(pair.key, { pair, alignment });
    return true;
  }

  has(a: number, b: number): boolean {
    return this.byKey.has(pairKey(a, b));
  }

  /** Alignment of a against b; transposed when the pair was stored as (b, a). */
  get(a: number, b: number): PairwiseAlignment | null {
    const entry = this.byKey.get(pairKey(a, b));
    if (!entry) return null;
    return entry.pair.lo === a ? entry.alignment : entry.alignment.transpose();
  }

  ids(): number[] {
    const seen = new Set<number>();
    for (const { pair } of this.byKey.values()) {
      seen.add(pair.lo);
      seen.add(pair.hi);
    }
    return [...seen].sort((x, y) => x - y);
  }

  entries(): AlignmentEntry[] {
    return [...this.byKey.values()];
  }

  toEntries(): RawAlignmentEntry[] {
    return this.entries().map(({ pair, alignment }) => [pair.toTuple(), [alignment.rowA, alignment.rowB]]);
  }
}
