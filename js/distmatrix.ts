import { jukesCantorDistance } from './jukescantor';
import { Result, ok, malformed } from './result';
import { validateAlignmentSet, ValidateOptions } from './validate';

export interface DistanceMatrix {
  /** Sequence ids in row/column order */
  ids: number[];
  values: number[][];
}

export function buildDistanceMatrix(raw: unknown, options: ValidateOptions = {}): Result<DistanceMatrix> {
  const validated = validateAlignmentSet(raw, options);
  if (!validated.ok) return validated;
  const { ids, alignments } = validated.value;

  const position = new Map(ids.map((id, pos): [number, number] => [id, pos]));
  const values = ids.map(() => new Array<number>(ids.length).fill(0.0));

  for (const { pair, alignment } of alignments.entries()) {
    const distance = jukesCantorDistance(alignment.rowA, alignment.rowB);
    if (!distance.ok) return distance;
    const x = position.get(pair.lo);
    const y = position.get(pair.hi);
    if (x === undefined || y === undefined) {
      return malformed(`pair (${pair.lo}, ${pair.hi}) is outside the id set`);
    }
    values[x][y] = distance.value;
    values[y][x] = distance.value;
  }

  return ok({ ids, values });
}

export function formatDistanceMatrix(matrix: DistanceMatrix, precision = 6): string[] {
  return matrix.values.map((row) => row.map((value) => value.toFixed(precision)).join(', '));
}
