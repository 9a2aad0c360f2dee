/**
 * GrammarProfile: Immutable Tables for One Embedded Grammar
 *
 * Every heuristic in the pipeline reads its keyword sets, marker
 * characters and pattern catalogue from a profile instead of from
 * module-level globals. A profile is frozen once built, so a single
 * instance can be shared across any number of concurrent detections.
 *
 * @module
 */

// ── Types ────────────────────────────────────────────────

/** Family of a security-sensitive construct. */
export type DangerCategory =
    | 'process'
    | 'eval'
    | 'filesystem'
    | 'network'
    | 'deserialization';

/** One entry of the danger catalogue. */
export interface DangerPattern {
    /** Stable identifier, e.g. `'os.system'` */
    readonly id: string;
    readonly category: DangerCategory;
    /** Matched case-insensitively; must not carry the `g` or `y` flag */
    readonly pattern: RegExp;
}

/** Location of the first problem found by a syntax check. */
export interface SyntaxIssue {
    readonly message: string;
    /** 1-based line within the checked source */
    readonly line: number;
}

/** Outcome of the authoritative parse step. */
export type SyntaxCheckResult =
    | { readonly ok: true }
    | { readonly ok: false; readonly issue: SyntaxIssue };

/**
 * Markers that belong to a different language family.
 * Their presence on a line is a strong negative signal.
 */
export interface ForeignMarkers {
    /** Substrings looked up in the lower-cased line */
    readonly substrings: readonly string[];
    /** Single characters looked up in the line as written */
    readonly characters: string;
}

export interface GrammarProfile {
    /** Human-readable grammar name (used in debug output) */
    readonly name: string;
    /** Tokens that reliably indicate code on their own */
    readonly strongKeywords: ReadonlySet<string>;
    /** Tokens too common in prose to count as a signal */
    readonly weakKeywords: ReadonlySet<string>;
    readonly foreignMarkers: ForeignMarkers;
    /** Line comment marker, e.g. `'#'` */
    readonly commentMarker: string;
    /** Compound-statement header: leading block keyword, trailing block opener */
    readonly blockHeader: RegExp;
    readonly dangerPatterns: readonly DangerPattern[];
    /** Authoritative parse attempt; must never throw */
    readonly checkSyntax: (source: string) => SyntaxCheckResult;
}

/** Plain-data input accepted by {@link defineGrammar}. */
export interface GrammarDefinition {
    readonly name: string;
    readonly strongKeywords: Iterable<string>;
    readonly weakKeywords: Iterable<string>;
    readonly foreignMarkers: ForeignMarkers;
    readonly commentMarker: string;
    readonly blockHeader: RegExp;
    readonly dangerPatterns: readonly DangerPattern[];
    readonly checkSyntax: (source: string) => SyntaxCheckResult;
}

// ── Factory ──────────────────────────────────────────────

/**
 * Build a frozen {@link GrammarProfile}.
 *
 * @throws Error when a word is both strong and weak, when the comment
 *   marker is empty, or when a pattern is stateful (`g` / `y` flag).
 */
export function defineGrammar(definition: GrammarDefinition): GrammarProfile {
    const strong = new Set(definition.strongKeywords);
    const weak = new Set(definition.weakKeywords);

    const overlap = [...weak].filter(word => strong.has(word));
    if (overlap.length > 0) {
        throw new Error(
            `[snippet-warden] Grammar "${definition.name}": weak keywords overlap strong keywords: ${overlap.join(', ')}`,
        );
    }

    if (definition.commentMarker.length === 0) {
        throw new Error(`[snippet-warden] Grammar "${definition.name}": comment marker must not be empty.`);
    }

    for (const entry of definition.dangerPatterns) {
        if (entry.pattern.global || entry.pattern.sticky) {
            throw new Error(
                `[snippet-warden] Grammar "${definition.name}": danger pattern "${entry.id}" must not be global or sticky.`,
            );
        }
    }

    return Object.freeze({
        name: definition.name,
        strongKeywords: strong,
        weakKeywords: weak,
        foreignMarkers: Object.freeze({
            substrings: Object.freeze([...definition.foreignMarkers.substrings]),
            characters: definition.foreignMarkers.characters,
        }),
        commentMarker: definition.commentMarker,
        blockHeader: definition.blockHeader,
        dangerPatterns: Object.freeze(definition.dangerPatterns.map(entry => Object.freeze({ ...entry }))),
        checkSyntax: definition.checkSyntax,
    });
}
