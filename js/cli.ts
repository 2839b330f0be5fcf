import fs from 'fs';
import Getopt from 'node-getopt';
import { alignAll } from './alignall';
import { buildDistanceMatrix, DistanceMatrix, formatDistanceMatrix } from './distmatrix';
import { Result, malformed } from './result';
import { parseSequenceFile } from './seqfile';

export interface CliIO {
  readFile(filename: string): string;
  out(line: string): void;
  err(line: string): void;
}

export const nodeIO: CliIO = {
  readFile: (filename) => fs.readFileSync(filename).toString(),
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

interface Computed {
  matrix: Result<DistanceMatrix>;
  labels?: string[];
}

function compute(input: string, fromAlignments: boolean): Computed {
  if (fromAlignments) {
    let raw: unknown;
    try {
      raw = JSON.parse(input);
    } catch (e) {
      return { matrix: malformed(`invalid JSON: ${message(e)}`) };
    }
    return { matrix: buildDistanceMatrix(raw) };
  }

  const sequences = parseSequenceFile(input);
  if (!sequences.ok) return { matrix: sequences };
  return {
    matrix: buildDistanceMatrix(alignAll(sequences.value), { sequences: sequences.value }),
    labels: sequences.value.map((s) => s.label),
  };
}

function message(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function parsePrecision(value: unknown): number | null {
  if (value === undefined) return 6;
  const precision = Number(value);
  return Number.isInteger(precision) && precision >= 0 && precision <= 20 ? precision : null;
}

/** Runs the distmatrix command and returns its exit code. */
export function main(argv: string[], io: CliIO = nodeIO): number {
  const getopt = new Getopt([
    ['a', 'alignments', 'Input is a JSON list of [[i, j], [rowA, rowB]] alignments'],
    ['p', 'precision=ARG', 'Decimal places in the printed matrix (default 6)'],
    ['j', 'json', 'Print the matrix as JSON'],
    ['h', 'help', 'Show this help'],
  ]);
  getopt.setHelp('Usage: distmatrix [options] input\n\n[[OPTIONS]]');
  getopt.error((e) => {
    throw e;
  });

  let opt: ReturnType<Getopt['parse']>;
  try {
    opt = getopt.parse(argv);
  } catch (e) {
    io.err(message(e));
    io.err(getopt.getHelp());
    return 1;
  }

  if (opt.options.help) {
    io.out(getopt.getHelp());
    return 0;
  }
  if (opt.argv.length != 1) {
    io.err(getopt.getHelp());
    return 1;
  }

  const precision = parsePrecision(opt.options.precision);
  if (precision === null) {
    io.err(`invalid precision: ${String(opt.options.precision)}`);
    return 1;
  }

  let input: string;
  try {
    input = io.readFile(opt.argv[0]);
  } catch (e) {
    io.err(`malformed input: cannot read ${opt.argv[0]}: ${message(e)}`);
    return 1;
  }

  const { matrix, labels } = compute(input, Boolean(opt.options.alignments));
  if (!matrix.ok) {
    io.err(matrix.error.reason ? `malformed input: ${matrix.error.reason}` : 'malformed input');
    return 1;
  }

  if (opt.options.json) {
    io.out(JSON.stringify({ ids: matrix.value.ids, labels, matrix: matrix.value.values }));
    return 0;
  }
  if (labels) io.out(labels.join(', '));
  for (const row of formatDistanceMatrix(matrix.value, precision)) {
    io.out(row);
  }
  return 0;
}
