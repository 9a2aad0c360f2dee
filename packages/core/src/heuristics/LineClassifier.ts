/**
 * LineClassifier: Does One Line Look Like a Statement?
 *
 * First match wins:
 *
 *   1. trimmed length < 3                        → no
 *   2. cut at the comment marker; remainder < 3  → no
 *   3. foreign-language marker present           → no (overrides everything)
 *   4. compound-statement header                 → yes
 *   5. any strong keyword token                  → yes
 *   6. otherwise                                 → no
 *
 * Weak keywords never qualify a line.
 *
 * @module
 */
import type { GrammarProfile } from '../grammar/GrammarProfile.js';
import { charLength, wordTokens } from './lines.js';

const MIN_SIGNAL_LENGTH = 3;

export function isLineCodeLike(line: string, grammar: GrammarProfile): boolean {
    let stripped = line.trim();
    if (charLength(stripped) < MIN_SIGNAL_LENGTH) return false;

    const markerAt = stripped.indexOf(grammar.commentMarker);
    if (markerAt !== -1) {
        const partial = stripped.slice(0, markerAt).trimEnd();
        if (charLength(partial) < MIN_SIGNAL_LENGTH) return false;
        stripped = partial;
    }

    if (hasForeignMarker(stripped, grammar)) return false;

    if (grammar.blockHeader.test(stripped)) return true;

    return hasStrongKeyword(wordTokens(stripped), grammar);
}

/**
 * Cheap whole-text gate run before segmentation of a string field.
 *
 * Text carrying foreign markers must also carry a strong keyword,
 * which is the same test every other text passes on, so the markers
 * do not need a separate lookup here. Tokens are taken from the
 * lower-cased text.
 */
export function mightContainCode(text: string, grammar: GrammarProfile): boolean {
    const lower = text.toLowerCase();
    return hasStrongKeyword(wordTokens(lower), grammar);
}

/** Foreign-language markers: substrings in the lower-cased line, characters as written. */
export function hasForeignMarker(line: string, grammar: GrammarProfile): boolean {
    const lower = line.toLowerCase();
    const { substrings, characters } = grammar.foreignMarkers;
    if (substrings.some(marker => lower.includes(marker))) return true;
    for (const ch of characters) {
        if (line.includes(ch)) return true;
    }
    return false;
}

function hasStrongKeyword(tokens: readonly string[], grammar: GrammarProfile): boolean {
    return tokens.some(token => grammar.strongKeywords.has(token));
}
