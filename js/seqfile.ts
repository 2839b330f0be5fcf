import { SequenceEntry } from './alignall';
import { Result, ok, malformed } from './result';

const NUCLEOTIDES = /^[ACGT]+$/;

function normalizeLabel(label: string): string {
  const lower = label.toLowerCase();
  return lower.charAt(0).toUpperCase() + lower.slice(1);
}

/**
 * Reads the one-record-per-line sequence format:
 *
 *   >label ACGT ACGT
 *
 * Blank lines are skipped; every other line must start with '>' and carry a
 * label followed by at least one run of bases. Spaces inside the bases are
 * dropped and the result upper-cased.
 */
export function parseSequenceFile(content: string): Result<SequenceEntry[]> {
  const entries: SequenceEntry[] = [];
  const lines = content.split('\n');

  for (let n = 0; n < lines.length; n++) {
    const line = lines[n].trim();
    if (!line) continue;
    if (!line.startsWith('>')) {
      return malformed(`line ${n + 1}: expected a record starting with '>'`);
    }

    const [label, ...rest] = line.slice(1).trim().split(/\s+/);
    if (!label || rest.length === 0) {
      return malformed(`line ${n + 1}: record needs a label and a sequence`);
    }

    const bases = rest.join('').toUpperCase();
    if (!NUCLEOTIDES.test(bases)) {
      return malformed(`line ${n + 1}: sequence may only contain A, C, G and T`);
    }
    entries.push({ label: normalizeLabel(label), bases });
  }

  return ok(entries);
}
