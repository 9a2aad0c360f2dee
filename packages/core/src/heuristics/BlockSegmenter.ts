/**
 * BlockSegmenter: Group Lines into Candidate Code Blocks
 *
 * One left-to-right pass with a single `inBlock` flag:
 *
 *   outside ── code-like line ──────────────────────► inside (start = i)
 *   inside  ── code-like | blank | indented line ───► inside
 *   inside  ── any other line ──────────────────────► outside (end = i - 1)
 *   end of input while inside ──────────────────────► end = last line
 *
 * The line that closes a block is not re-examined as an opener.
 * Blank and indented lines only continue a block, so nested bodies
 * survive without each line looking like code on its own.
 *
 * @module
 */
import type { GrammarProfile } from '../grammar/GrammarProfile.js';
import { isLineCodeLike } from './LineClassifier.js';
import { splitLinesKeepEnds } from './lines.js';

/** Inclusive line range of a candidate block. */
export interface BlockRange {
    readonly start: number;
    readonly end: number;
}

/** A candidate block with its text (terminators kept). */
export interface CandidateBlock extends BlockRange {
    readonly text: string;
}

/**
 * Locate candidate blocks in `text`.
 *
 * @returns Non-overlapping ranges in strictly increasing order
 */
export function formCodeBlocks(text: string, grammar: GrammarProfile): BlockRange[] {
    return segmentLines(splitLinesKeepEnds(text), grammar);
}

/** {@link formCodeBlocks} over lines already split with their terminators. */
export function segmentLines(lines: readonly string[], grammar: GrammarProfile): BlockRange[] {
    const blocks: BlockRange[] = [];
    let inBlock = false;
    let blockStart = 0;

    lines.forEach((line, i) => {
        if (inBlock) {
            if (isLineCodeLike(line, grammar) || line.trim() === '' || line.startsWith(' ') || line.startsWith('\t')) {
                return;
            }
            blocks.push({ start: blockStart, end: i - 1 });
            inBlock = false;
            return;
        }

        if (isLineCodeLike(line, grammar)) {
            inBlock = true;
            blockStart = i;
        }
    });

    if (inBlock) blocks.push({ start: blockStart, end: lines.length - 1 });
    return blocks;
}

/** Materialise ranges into {@link CandidateBlock}s. */
export function toCandidateBlocks(lines: readonly string[], ranges: readonly BlockRange[]): CandidateBlock[] {
    return ranges.map(({ start, end }) => ({
        start,
        end,
        text: lines.slice(start, end + 1).join(''),
    }));
}
