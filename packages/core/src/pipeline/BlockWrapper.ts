/**
 * BlockWrapper: Segment, Score and Wrap One Text
 *
 * Walks the candidate blocks of a text in order, copying the lines
 * between them verbatim and wrapping each block whose score clears the
 * threshold in `startTag + block + endTag`.
 *
 * Revert rule: when at least one block was wrapped but the mean score
 * of all blocks is below the threshold, every wrap is discarded and the
 * original text is returned with `wrapped: false`. One strong fragment
 * cannot carry a text whose blocks are mostly weak.
 *
 * Every copied span and every block is run through the danger scan;
 * the flag only ever turns on.
 *
 * @module
 */
import { segmentLines } from '../heuristics/BlockSegmenter.js';
import { scoreBlock } from '../heuristics/ConfidenceScorer.js';
import { splitLinesKeepEnds } from '../heuristics/lines.js';
import { scanDanger, type PipelineContext } from './PipelineContext.js';

export interface WrapResult {
    /** Wrapped text, or the input unchanged when nothing stayed wrapped */
    readonly text: string;
    /** Arithmetic mean of the block scores (0 when there are no blocks) */
    readonly confidence: number;
    /** Whether the returned text carries any wrap */
    readonly wrapped: boolean;
    /** Whether local wraps were discarded by the revert rule */
    readonly reverted: boolean;
    readonly dangerous: boolean;
    /** Per-block scores, in block order */
    readonly scores: readonly number[];
}

export function wrapCodeBlocks(
    text: string,
    startTag: string,
    endTag: string,
    context: PipelineContext,
): WrapResult {
    const lines = splitLinesKeepEnds(text);
    const blocks = segmentLines(lines, context.grammar);

    if (blocks.length === 0) {
        return {
            text,
            confidence: 0,
            wrapped: false,
            reverted: false,
            dangerous: scanDanger(text, context),
            scores: [],
        };
    }

    const out: string[] = [];
    const scores: number[] = [];
    let dangerous = false;
    let wrappedAny = false;
    let last = 0;

    const copySpan = (from: number, to: number): void => {
        if (from >= to) return;
        const span = lines.slice(from, to).join('');
        if (scanDanger(span, context)) dangerous = true;
        out.push(span);
    };

    for (const { start, end } of blocks) {
        copySpan(last, start);

        const blockText = lines.slice(start, end + 1).join('');
        const { score, basis } = scoreBlock(blockText, context.grammar);
        scores.push(score);

        if (scanDanger(blockText, context)) dangerous = true;

        const wrapBlock = score >= context.threshold;
        if (wrapBlock) {
            out.push(`${startTag}${blockText}${endTag}`);
            wrappedAny = true;
        } else {
            out.push(blockText);
        }

        context.debug?.({ type: 'score', start, end, score, basis, wrapped: wrapBlock, timestamp: Date.now() });
        last = end + 1;
    }

    copySpan(last, lines.length);

    const confidence = mean(scores);

    if (wrappedAny && confidence < context.threshold) {
        context.debug?.({
            type: 'revert',
            mode: 'text',
            confidence,
            threshold: context.threshold,
            timestamp: Date.now(),
        });
        return { text, confidence, wrapped: false, reverted: true, dangerous, scores };
    }

    return { text: out.join(''), confidence, wrapped: wrappedAny, reverted: false, dangerous, scores };
}

/** Arithmetic mean; 0 for an empty list. */
export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return values.reduce((sum, value) => sum + value, 0) / values.length;
}
