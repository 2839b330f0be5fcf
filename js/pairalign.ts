import { Result, ok, malformed } from './result';

export const GAP = '-';

const ALIGNED_CHAR = /^[ACGTacgt-]*$/;

export interface ScoringScheme {
  match: number;
  mismatch: number;
  gap: number;
}

export function checkRows(rowA: string, rowB: string): string | null {
  if (rowA.length === 0 || rowB.length === 0) {
    return 'alignment rows must be non-empty';
  }
  if (rowA.length !== rowB.length) {
    return `alignment rows differ in length (${rowA.length} vs ${rowB.length})`;
  }
  if (!ALIGNED_CHAR.test(rowA) || !ALIGNED_CHAR.test(rowB)) {
    return 'alignment rows may only contain A, C, G, T and -';
  }
  return null;
}

/** Two gapped rows of equal length over {A,C,G,T,-}, stored upper-case. */
export class PairwiseAlignment {
  readonly rowA: string;
  readonly rowB: string;

  constructor(rowA: string, rowB: string) {
    const problem = checkRows(rowA, rowB);
    if (problem !== null) {
      throw new Error(`Invalid alignment: ${problem}`);
    }
    this.rowA = rowA.toUpperCase();
    this.rowB = rowB.toUpperCase();
  }

  static parse(rowA: string, rowB: string): Result<PairwiseAlignment> {
    const problem = checkRows(rowA, rowB);
    return problem === null ? ok(new PairwiseAlignment(rowA, rowB)) : malformed(problem);
  }

  size(): number {
    return this.rowA.length;
  }

  get_nth(n: number): [string, string] {
    if (n < 1 || n > this.rowA.length) {
      throw new Error('Index out of bounds');
    }
    return [this.rowA[n - 1], this.rowB[n - 1]];
  }

  *columns(): IterableIterator<[string, string]> {
    for (let k = 0; k < this.rowA.length; k++) {
      yield [this.rowA[k], this.rowB[k]];
    }
  }

  ungapped(): [string, string] {
    return [this.rowA.split(GAP).join(''), this.rowB.split(GAP).join('')];
  }

  transpose(): PairwiseAlignment {
    return new PairwiseAlignment(this.rowB, this.rowA);
  }

  /** Sum of per-column scores under a linear gap penalty. */
  score(scheme: ScoringScheme): number {
    let total = 0;
    for (const [a, b] of this.columns()) {
      if (a === GAP || b === GAP) {
        total += scheme.gap;
      } else {
        total += a === b ? scheme.match : scheme.mismatch;
      }
    }
    return total;
  }
}
