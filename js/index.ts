export { Result, Success, Failure, MalformedInput, MalformedInputError, ok, malformed, unwrap } from './result';
export { IndexPair, enumeratePairs, pairKey } from './pairs';
export { PairwiseAlignment, ScoringScheme, GAP } from './pairalign';
export { AlignmentSet, AlignmentEntry, RawAlignmentEntry } from './alignset';
export { SCORING, align, alignWithScore, fillMatrix, traceback, GlobalAlignment } from './needleman';
export { SequenceEntry, AlignAllOptions, alignAll, alignAllAsync } from './alignall';
export { validateAlignmentSet, ValidatedAlignments, ValidateOptions } from './validate';
export { SATURATED_DISTANCE, jukesCantorDistance, countSites } from './jukescantor';
export { DistanceMatrix, buildDistanceMatrix, formatDistanceMatrix } from './distmatrix';
export { parseSequenceFile } from './seqfile';
