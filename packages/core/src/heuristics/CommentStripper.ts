/**
 * Drop line comments from a block before it is scored.
 *
 * Each line is cut at the first comment marker with no awareness of
 * string literals, so a marker inside a string also truncates the line.
 * The emitted output never goes through here.
 */
import type { GrammarProfile } from '../grammar/GrammarProfile.js';
import { splitLines } from './lines.js';

export function stripComments(block: string, grammar: GrammarProfile): string {
    return splitLines(block)
        .map(line => {
            const markerAt = line.indexOf(grammar.commentMarker);
            return markerAt === -1 ? line : line.slice(0, markerAt);
        })
        .join('\n');
}
