import { GAP, PairwiseAlignment, ScoringScheme } from './pairalign';

export const SCORING: Readonly<ScoringScheme> = Object.freeze({ match: 5, mismatch: -2, gap: -6 });

// Traceback codes. On a tie the lowest code wins.
export const DIAG = 0;
export const UP = 1;
export const LEFT = 2;

export interface DPMatrix {
  /** (m+1)*(n+1) scores, row-major with width n+1 */
  score: Float64Array;
  trace: Uint8Array;
  width: number;
}

export interface GlobalAlignment {
  alignment: PairwiseAlignment;
  score: number;
}

export function fillMatrix(seqA: string, seqB: string, scheme: ScoringScheme = SCORING): DPMatrix {
  const m = seqA.length;
  const n = seqB.length;
  const width = n + 1;
  const score = new Float64Array((m + 1) * width);
  const trace = new Uint8Array((m + 1) * width);

  for (let i = 1; i <= m; i++) {
    score[i * width] = i * scheme.gap;
    trace[i * width] = UP;
  }
  for (let j = 1; j <= n; j++) {
    score[j] = j * scheme.gap;
    trace[j] = LEFT;
  }

  for (let i = 1; i <= m; i++) {
    const row = i * width;
    const prev = row - width;
    for (let j = 1; j <= n; j++) {
      const diag = score[prev + j - 1] + (seqA[i - 1] === seqB[j - 1] ? scheme.match : scheme.mismatch);
      const up = score[prev + j] + scheme.gap;
      const left = score[row + j - 1] + scheme.gap;

      if (diag >= up && diag >= left) {
        score[row + j] = diag;
        trace[row + j] = DIAG;
      } else if (up >= left) {
        score[row + j] = up;
        trace[row + j] = UP;
      } else {
        score[row + j] = left;
        trace[row + j] = LEFT;
      }
    }
  }

  return { score, trace, width };
}

export function traceback(seqA: string, seqB: string, matrix: DPMatrix): [string, string] {
  const { trace, width } = matrix;
  const alignedA: string[] = [];
  const alignedB: string[] = [];
  let i = seqA.length;
  let j = seqB.length;

  while (i > 0 || j > 0) {
    const move = i === 0 ? LEFT : j === 0 ? UP : trace[i * width + j];
    if (move === DIAG) {
      alignedA.push(seqA[--i]);
      alignedB.push(seqB[--j]);
    } else if (move === UP) {
      alignedA.push(seqA[--i]);
      alignedB.push(GAP);
    } else {
      alignedA.push(GAP);
      alignedB.push(seqB[--j]);
    }
  }

  return [alignedA.reverse().join(''), alignedB.reverse().join('')];
}

/** Optimal global alignment of two non-empty nucleotide sequences, with its score. */
export function alignWithScore(seqA: string, seqB: string, scheme: ScoringScheme = SCORING): GlobalAlignment {
  const matrix = fillMatrix(seqA, seqB, scheme);
  const [rowA, rowB] = traceback(seqA, seqB, matrix);
  return {
    alignment: new PairwiseAlignment(rowA, rowB),
    score: matrix.score[matrix.score.length - 1],
  };
}

export function align(seqA: string, seqB: string, scheme: ScoringScheme = SCORING): PairwiseAlignment {
  return alignWithScore(seqA, seqB, scheme).alignment;
}
