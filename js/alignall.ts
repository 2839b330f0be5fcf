import { AlignmentSet } from './alignset';
import { align } from './needleman';
import { IndexPair, enumeratePairs } from './pairs';
import { PairwiseAlignment } from './pairalign';

export interface SequenceEntry {
  label: string;
  bases: string;
}

export interface AlignAllOptions {
  /** Number of pair tasks in flight at once (default 4) */
  concurrency?: number;
  signal?: AbortSignal;
}

function alignPair(sequences: readonly SequenceEntry[], pair: IndexPair): PairwiseAlignment {
  return align(sequences[pair.lo].bases.toUpperCase(), sequences[pair.hi].bases.toUpperCase());
}

export function alignAll(sequences: readonly SequenceEntry[]): AlignmentSet {
  const set = new AlignmentSet();
  for (const pair of enumeratePairs(sequences.length)) {
    set.add(pair, alignPair(sequences, pair));
  }
  return set;
}

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Same result as alignAll, but each pair is an independent task run through
 * a bounded pool that yields to the event loop between pairs. Results are
 * merged by canonical pair once every task has finished.
 */
export async function alignAllAsync(
  sequences: readonly SequenceEntry[],
  options: AlignAllOptions = {},
): Promise<AlignmentSet> {
  const { concurrency = 4, signal } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const pending = enumeratePairs(sequences.length);
  const done = new Map<string, PairwiseAlignment>();

  const worker = async (): Promise<void> => {
    for (let pair = pending.shift(); pair; pair = pending.shift()) {
      await yieldToEventLoop();
      signal?.throwIfAborted();
      done.set(pair.key, alignPair(sequences, pair));
    }
  };

  signal?.throwIfAborted();
  await Promise.all(Array.from({ length: Math.min(concurrency, pending.length) }, worker));

  const set = new AlignmentSet();
  for (const pair of enumeratePairs(sequences.length)) {
    const alignment = done.get(pair.key);
    if (alignment) set.add(pair, alignment);
  }
  return set;
}
