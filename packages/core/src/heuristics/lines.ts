/**
 * Line splitting shared by the segmenter, scorer and wrapper.
 *
 * Recognised terminators: `\r\n`, `\n`, `\r`, vertical tab, form feed,
 * the file/group/record separators (U+001C to U+001E), NEL (U+0085) and
 * the Unicode line and paragraph separators (U+2028, U+2029).
 *
 * @module
 * @internal
 */

const LINE_WITH_END = /[^\n\r\v\f\x1c-\x1e\x85\u2028\u2029]*(?:\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029])|[^\n\r\v\f\x1c-\x1e\x85\u2028\u2029]+$/g;
const LINE_END = /(?:\r\n|[\n\r\v\f\x1c-\x1e\x85\u2028\u2029])$/;

/**
 * Split into lines, keeping each terminator.
 * Joining the result reproduces `text` exactly.
 */
export function splitLinesKeepEnds(text: string): string[] {
    return text.match(LINE_WITH_END) ?? [];
}

/** Split into lines without terminators; a trailing terminator adds no empty line. */
export function splitLines(text: string): string[] {
    return splitLinesKeepEnds(text).map(stripLineEnd);
}

export function stripLineEnd(line: string): string {
    return line.replace(LINE_END, '');
}

/** Maximal runs of ASCII letters and underscores. */
export function wordTokens(text: string): string[] {
    return text.match(/[A-Za-z_]+/g) ?? [];
}

/** Length in code points, so astral characters count once. */
export function charLength(text: string): number {
    return [...text].length;
}
