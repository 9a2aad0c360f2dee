/** Heuristics: Barrel Export */
export { isLineCodeLike, mightContainCode, hasForeignMarker } from './LineClassifier.js';
export { containsDangerousPattern, findDangerousPatterns } from './DangerScanner.js';
export { stripComments } from './CommentStripper.js';
export { formCodeBlocks, segmentLines, toCandidateBlocks } from './BlockSegmenter.js';
export type { BlockRange, CandidateBlock } from './BlockSegmenter.js';
export { scoreBlock, dedent, SINGLE_LINE_SCORE, MULTI_LINE_SCORE } from './ConfidenceScorer.js';
export type { BlockScore, ScoreBasis } from './ConfidenceScorer.js';
export { splitLinesKeepEnds, splitLines, wordTokens } from './lines.js';
