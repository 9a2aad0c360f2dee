/**
 * DangerScanner: Binary Tripwire for Security-Sensitive Calls
 *
 * Matches the grammar's danger catalogue against raw text, independent
 * of line boundaries and of whether the text looks like code. There is
 * no weighting: a single match flags the whole text.
 *
 * The flag is layered on top of the wrap decision and never gates it.
 *
 * @module
 */
import type { DangerPattern, GrammarProfile } from '../grammar/GrammarProfile.js';

/** True on the first catalogue match anywhere in `text`. */
export function containsDangerousPattern(text: string, grammar: GrammarProfile): boolean {
    return grammar.dangerPatterns.some(entry => entry.pattern.test(text));
}

/** Every catalogue entry that matches `text`, in catalogue order. */
export function findDangerousPatterns(text: string, grammar: GrammarProfile): DangerPattern[] {
    return grammar.dangerPatterns.filter(entry => entry.pattern.test(text));
}
