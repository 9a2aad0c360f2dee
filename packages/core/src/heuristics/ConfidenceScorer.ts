/**
 * ConfidenceScorer: Three-Level Score for One Candidate Block
 *
 *   strip comments ─► non-empty lines? ──no──► 0    (empty)
 *                          │ yes
 *                          ▼
 *                       dedent ─► checkSyntax ──ok──► 80 | 100   (parse)
 *                                      │ fails
 *                                      ▼
 *                 strong keyword in uncommented block? ──yes──► 80 | 100 (keyword)
 *                                      │ no
 *                                      ▼
 *                                      0    (none)
 *
 * 80 for a single line, 100 for more than one. The score is meant to
 * be decisive, not a smooth probability.
 *
 * @module
 */
import type { GrammarProfile } from '../grammar/GrammarProfile.js';
import { stripComments } from './CommentStripper.js';
import { splitLines, wordTokens } from './lines.js';

/** Which rule produced a score. */
export type ScoreBasis = 'empty' | 'parse' | 'keyword' | 'none';

export interface BlockScore {
    /** One of 0, 80 or 100 */
    readonly score: number;
    readonly basis: ScoreBasis;
}

export const SINGLE_LINE_SCORE = 80;
export const MULTI_LINE_SCORE = 100;

export function scoreBlock(block: string, grammar: GrammarProfile): BlockScore {
    const uncommented = stripComments(block, grammar);
    const codeLines = splitLines(uncommented).filter(line => line.trim() !== '');
    if (codeLines.length === 0) return { score: 0, basis: 'empty' };

    const structured = codeLines.length === 1 ? SINGLE_LINE_SCORE : MULTI_LINE_SCORE;

    if (grammar.checkSyntax(dedent(codeLines.join('\n'))).ok) {
        return { score: structured, basis: 'parse' };
    }

    const hasKeyword = wordTokens(uncommented).some(token => grammar.strongKeywords.has(token));
    return hasKeyword
        ? { score: structured, basis: 'keyword' }
        : { score: 0, basis: 'none' };
}

/**
 * Remove the longest leading-whitespace prefix shared by every
 * non-blank line. Whitespace-only lines are emptied.
 * Tabs and spaces are not interchangeable.
 */
export function dedent(text: string): string {
    const lines = text.split('\n');
    let margin: string | undefined;

    for (const line of lines) {
        if (line.trim() === '') continue;
        const indent = /^[ \t]*/.exec(line)?.[0] ?? '';
        if (margin === undefined) {
            margin = indent;
            continue;
        }
        let shared = 0;
        while (shared < margin.length && shared < indent.length && margin[shared] === indent[shared]) shared++;
        margin = margin.slice(0, shared);
    }

    const prefix = margin ?? '';
    return lines
        .map(line => (line.trim() === '' ? '' : line.slice(prefix.length)))
        .join('\n');
}
