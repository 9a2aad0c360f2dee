/**
 * StringFieldProcessor: Wrap Code Inside One JSON String Value
 *
 * Payloads often carry a multi-line snippet as a single string with
 * literal `\n` sequences. Those are turned into real line breaks for
 * analysis and turned back after wrapping.
 *
 * Gates, in order:
 * 1. trimmed length < 5                       → unchanged, no score
 * 2. pre-filter and danger scan both quiet    → unchanged, no score
 * 3. wrapper did not wrap                     → the ORIGINAL string, with its score
 * 4. wrapper wrapped                          → re-escaped wrapped text
 *
 * @module
 */
import { charLength } from '../heuristics/lines.js';
import { mightContainCode } from '../heuristics/LineClassifier.js';
import { wrapCodeBlocks } from './BlockWrapper.js';
import { scanDanger, type PipelineContext } from './PipelineContext.js';

export interface FieldResult {
    readonly value: string;
    /** Zero or one confidence entry */
    readonly scores: readonly number[];
    readonly wrapped: boolean;
    /** Whether `value` differs from the original string */
    readonly changed: boolean;
    readonly dangerous: boolean;
}

const MIN_FIELD_LENGTH = 5;

export function processStringField(
    original: string,
    startTag: string,
    endTag: string,
    context: PipelineContext,
): FieldResult {
    const untouched: FieldResult = { value: original, scores: [], wrapped: false, changed: false, dangerous: false };

    const length = charLength(original);
    if (charLength(original.trim()) < MIN_FIELD_LENGTH) {
        context.debug?.({ type: 'skip', reason: 'short', length, timestamp: Date.now() });
        return untouched;
    }

    const unescaped = interpretEscapedNewlines(original);
    const dangerous = scanDanger(unescaped, context);
    if (!dangerous && !mightContainCode(unescaped, context.grammar)) {
        context.debug?.({ type: 'skip', reason: 'no-signal', length, timestamp: Date.now() });
        return untouched;
    }

    const result = wrapCodeBlocks(unescaped, startTag, endTag, context);
    const fieldDangerous = dangerous || result.dangerous;

    if (result.wrapped) {
        const reescaped = reescapeNewlines(result.text);
        return {
            value: reescaped,
            scores: [result.confidence],
            wrapped: true,
            changed: reescaped !== original,
            dangerous: fieldDangerous,
        };
    }

    return { value: original, scores: [result.confidence], wrapped: false, changed: false, dangerous: fieldDangerous };
}

/** Literal `\n` / `\r` sequences become real line breaks. */
export function interpretEscapedNewlines(text: string): string {
    return text.replaceAll('\\n', '\n').replaceAll('\\r', '\r');
}

/** Real line breaks become literal `\r` / `\n` sequences. */
export function reescapeNewlines(text: string): string {
    return text.replaceAll('\r', '\\r').replaceAll('\n', '\\n');
}
