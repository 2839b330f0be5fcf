import * as fs from 'fs';
import * as path from 'path';
import { CliIO, main } from '../cli';

interface TestData {
  sequence_file: string;
}

const ALIGNMENTS = '[[[1,2],["AA","AA"]],[[1,3],["AA","AT"]],[[2,3],["AA","AT"]]]';

function capture(files: Record<string, string>) {
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    readFile: (filename) => {
      if (!(filename in files)) throw new Error(`ENOENT: ${filename}`);
      return files[filename];
    },
    out: (line) => out.push(line),
    err: (line) => err.push(line),
  };
  return { io, out, err };
}

describe('distmatrix command', () => {
  let testData: TestData;

  beforeAll(() => {
    const testFile = path.join(__dirname, 'test_data.json');
    testData = JSON.parse(fs.readFileSync(testFile, 'utf8'));
  });

  test('should align a sequence file and print the labelled matrix', () => {
    const { io, out, err } = capture({ 'seqs.txt': testData.sequence_file });
    expect(main(['seqs.txt'], io)).toBe(0);
    expect(err).toEqual([]);
    expect(out).toEqual([
      'Human, Mouse, Chimp',
      '0.000000, 0.136741, 0.136741',
      '0.136741, 0.000000, 0.304099',
      '0.136741, 0.304099, 0.000000',
    ]);
  });

  test('--precision should control decimal places', () => {
    const { io, out } = capture({ 'seqs.txt': testData.sequence_file });
    expect(main(['-p', '3', 'seqs.txt'], io)).toBe(0);
    expect(out.slice(1)).toEqual(['0.000, 0.137, 0.137', '0.137, 0.000, 0.304', '0.137, 0.304, 0.000']);
  });

  test('--json should print ids, labels and raw values', () => {
    const { io, out } = capture({ 'seqs.txt': testData.sequence_file });
    expect(main(['--json', 'seqs.txt'], io)).toBe(0);
    expect(out).toHaveLength(1);
    const printed = JSON.parse(out[0]);
    expect(printed.ids).toEqual([0, 1, 2]);
    expect(printed.labels).toEqual(['Human', 'Mouse', 'Chimp']);
    expect(printed.matrix[1][2]).toBeCloseTo(-0.75 * Math.log(2 / 3), 12);
  });

  test('--alignments should read a JSON entry list', () => {
    const { io, out } = capture({ 'aln.json': ALIGNMENTS });
    expect(main(['--alignments', 'aln.json'], io)).toBe(0);
    expect(out).toEqual([
      '0.000000, 0.000000, 0.823959',
      '0.000000, 0.000000, 0.823959',
      '0.823959, 0.823959, 0.000000',
    ]);
  });

  test('should report malformed alignments', () => {
    const { io, out, err } = capture({ 'aln.json': '[[[1,2],["AA","AA"]],[[1,3],["AA","AT"]]]' });
    expect(main(['-a', 'aln.json'], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual(['malformed input: missing alignment for pair (2, 3)']);
  });

  test('should report invalid JSON', () => {
    const { io, err } = capture({ 'aln.json': '{not json' });
    expect(main(['-a', 'aln.json'], io)).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^malformed input: invalid JSON: /);
  });

  test('should report malformed sequence files', () => {
    const { io, err } = capture({ 'seqs.txt': '>human ACGN\n>mouse ACGT\n' });
    expect(main(['seqs.txt'], io)).toBe(1);
    expect(err).toEqual(['malformed input: line 1: sequence may only contain A, C, G and T']);
  });

  test('a single sequence cannot form a matrix', () => {
    const { io, err } = capture({ 'seqs.txt': '>human ACGT\n' });
    expect(main(['seqs.txt'], io)).toBe(1);
    expect(err).toEqual(['malformed input: alignment map must be a non-empty collection of entries']);
  });

  test('should report unreadable files', () => {
    const { io, err } = capture({});
    expect(main(['missing.txt'], io)).toBe(1);
    expect(err).toEqual(['malformed input: cannot read missing.txt: ENOENT: missing.txt']);
  });

  test('should print usage without an input', () => {
    const { io, out, err } = capture({});
    expect(main([], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
    expect(err[0]).toContain('Usage: distmatrix [options] input');
  });

  test('--help should print usage and succeed', () => {
    const { io, out } = capture({});
    expect(main(['--help'], io)).toBe(0);
    expect(out[0]).toContain('Usage: distmatrix [options] input');
    expect(out[0]).toContain('--precision');
  });

  test('should reject a non-numeric precision', () => {
    const { io, err } = capture({ 'seqs.txt': testData.sequence_file });
    expect(main(['-p', 'many', 'seqs.txt'], io)).toBe(1);
    expect(err).toEqual(['invalid precision: many']);
  });
});
