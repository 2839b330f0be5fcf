import { AlignmentSet } from './alignset';
import { SequenceEntry } from './alignall';
import { IndexPair } from './pairs';
import { PairwiseAlignment } from './pairalign';
import { Result, ok, malformed } from './result';

export interface ValidatedAlignments {
  /** Every identifier mentioned by a key, ascending */
  ids: number[];
  alignments: AlignmentSet;
}

export interface ValidateOptions {
  /**
   * When given, each id must index into this list and the ungapped rows of
   * every pair must reproduce the bases of the two sequences.
   */
  sequences?: readonly SequenceEntry[];
}

function rawEntries(raw: unknown): unknown[] | null {
  if (raw instanceof AlignmentSet) return raw.toEntries();
  if (raw instanceof Map) return [...raw.entries()];
  if (Array.isArray(raw)) return raw;
  return null;
}

function isStringPair(value: unknown): value is [string, string] {
  return Array.isArray(value) && value.length === 2 && typeof value[0] === 'string' && typeof value[1] === 'string';
}

function parseEntry(entry: unknown): Result<[IndexPair, PairwiseAlignment]> {
  if (!Array.isArray(entry) || entry.length !== 2) {
    return malformed('each entry must be a [key, value] pair');
  }
  const [key, value]: unknown[] = entry;

  if (!Array.isArray(key) || key.length !== 2) {
    return malformed(`key ${JSON.stringify(key)} is not a pair of indices`);
  }
  const [i, j]: unknown[] = key;
  if (typeof i !== 'number' || typeof j !== 'number') {
    return malformed(`key ${JSON.stringify(key)} is not a pair of indices`);
  }
  const pair = IndexPair.of(i, j);
  if (!pair.ok) return pair;

  if (!isStringPair(value)) {
    return malformed(`value for (${i}, ${j}) is not a pair of strings`);
  }
  const alignment = PairwiseAlignment.parse(value[0], value[1]);
  if (!alignment.ok) {
    return malformed(`(${i}, ${j}): ${alignment.error.reason}`);
  }

  // rows follow (lo, hi) once the key is canonicalized
  const rows = i < j ? alignment.value : alignment.value.transpose();
  return ok<[IndexPair, PairwiseAlignment]>([pair.value, rows]);
}

function crossCheck(alignments: AlignmentSet, sequences: readonly SequenceEntry[]): Result<null> {
  for (const { pair, alignment } of alignments.entries()) {
    if (pair.hi >= sequences.length) {
      return malformed(`id ${pair.hi} has no matching sequence`);
    }
    const [a, b] = alignment.ungapped();
    if (a !== sequences[pair.lo].bases.toUpperCase() || b !== sequences[pair.hi].bases.toUpperCase()) {
      return malformed(`alignment (${pair.lo}, ${pair.hi}) does not reproduce its sequences`);
    }
  }
  return ok(null);
}

/**
 * Normalizes and validates an alignment map given as a Map, an array of
 * [[i, j], [rowA, rowB]] entries, or an AlignmentSet. Keys are canonicalized
 * to (lo, hi), swapping the rows of reversed keys, and must cover every pair
 * of the mentioned ids exactly once.
 */
export function validateAlignmentSet(raw: unknown, options: ValidateOptions = {}): Result<ValidatedAlignments> {
  const entries = rawEntries(raw);
  if (entries === null || entries.length === 0) {
    return malformed('alignment map must be a non-empty collection of entries');
  }

  const alignments = new AlignmentSet();
  for (const entry of entries) {
    const parsed = parseEntry(entry);
    if (!parsed.ok) return parsed;
    const [pair, alignment] = parsed.value;
    if (!alignments.add(pair, alignment)) {
      return malformed(`duplicate entry for pair (${pair.lo}, ${pair.hi})`);
    }
  }

  const ids = alignments.ids();
  if (ids.length < 2) {
    return malformed('at least two identifiers are required');
  }

  const expected = (ids.length * (ids.length - 1)) / 2;
  for (let x = 0; x < ids.length; x++) {
    for (let y = x + 1; y < ids.length; y++) {
      if (!alignments.has(ids[x], ids[y])) {
        return malformed(`missing alignment for pair (${ids[x]}, ${ids[y]})`);
      }
    }
  }
  if (alignments.size !== expected) {
    return malformed('alignment map contains pairs outside the complete set');
  }

  if (options.sequences) {
    const checked = crossCheck(alignments, options.sequences);
    if (!checked.ok) return checked;
  }

  return ok({ ids, alignments });
}
