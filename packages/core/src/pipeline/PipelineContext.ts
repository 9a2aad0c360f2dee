/**
 * Read-only inputs shared by every stage of one detection call.
 *
 * @module
 * @internal
 */
import type { GrammarProfile } from '../grammar/GrammarProfile.js';
import { containsDangerousPattern, findDangerousPatterns } from '../heuristics/DangerScanner.js';
import type { DebugObserverFn } from '../observability/DebugObserver.js';

export interface PipelineContext {
    readonly grammar: GrammarProfile;
    /** Minimum score for a block, and minimum mean for a text, to stay wrapped */
    readonly threshold: number;
    readonly debug?: DebugObserverFn | undefined;
}

/**
 * Danger scan that also emits a `danger` event when an observer is attached.
 */
export function scanDanger(text: string, context: PipelineContext): boolean {
    if (!context.debug) return containsDangerousPattern(text, context.grammar);

    const matches = findDangerousPatterns(text, context.grammar);
    if (matches.length === 0) return false;
    context.debug({
        type: 'danger',
        patterns: matches.map(entry => entry.id),
        categories: [...new Set(matches.map(entry => entry.category))],
        timestamp: Date.now(),
    });
    return true;
}
