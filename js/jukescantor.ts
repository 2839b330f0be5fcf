import { GAP } from './pairalign';
import { Result, ok, malformed } from './result';

/** Distance reported once the p-distance reaches 3/4 and the correction diverges. */
export const SATURATED_DISTANCE = 30.0;

export interface SiteCounts {
  comparable: number;
  mismatches: number;
}

/** Counts gap-free columns and how many of them disagree. */
export function countSites(gappedA: string, gappedB: string): SiteCounts {
  const a = gappedA.toUpperCase();
  const b = gappedB.toUpperCase();
  let comparable = 0;
  let mismatches = 0;
  for (let k = 0; k < a.length; k++) {
    if (a[k] === GAP || b[k] === GAP) continue;
    comparable++;
    if (a[k] !== b[k]) mismatches++;
  }
  return { comparable, mismatches };
}

/**
 * Jukes-Cantor distance, -3/4 ln(1 - 4p/3), between two aligned rows.
 * Zero when no column is comparable or none differs; SATURATED_DISTANCE
 * when p >= 0.75.
 */
export function jukesCantorDistance(gappedA: string, gappedB: string): Result<number> {
  if (gappedA.length !== gappedB.length) {
    return malformed(`aligned rows differ in length (${gappedA.length} vs ${gappedB.length})`);
  }

  const { comparable, mismatches } = countSites(gappedA, gappedB);
  if (comparable === 0 || mismatches === 0) return ok(0.0);

  const p = mismatches / comparable;
  if (p >= 0.75) return ok(SATURATED_DISTANCE);

  const correction = 1.0 - (4.0 / 3.0) * p;
  // unreachable while p < 0.75
  if (correction <= 0) {
    return malformed(`non-positive Jukes-Cantor correction ${correction}`);
  }

  return ok(-0.75 * Math.log(correction));
}
