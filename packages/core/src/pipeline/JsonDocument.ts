/**
 * JsonDocument: Order-Preserving JSON Reader and Writer
 *
 * `JSON.parse` hoists integer-like keys to the front of an object, so a
 * payload such as `{"b": 1, "10": 2}` would come back reordered. The
 * reader here keeps source order by building a small tagged tree:
 *
 *   object  → ordered `[key, node]` entries
 *   array   → items
 *   string  → decoded value (+ source literal)
 *   scalar  → number / true / false / null, as its source literal
 *
 * Input is validated by `JSON.parse` first, so the reader only ever
 * walks well-formed text and the error message is the engine's own.
 *
 * @module
 */
import { DetectionError } from '../detector/DetectionError.js';

// ── Tree ─────────────────────────────────────────────────

export interface JsonObjectNode {
    readonly kind: 'object';
    /** Source order; a repeated key keeps its first position and its last value */
    readonly entries: readonly JsonEntry[];
}

export interface JsonEntry {
    readonly key: string;
    readonly value: JsonNode;
}

export interface JsonArrayNode {
    readonly kind: 'array';
    readonly items: readonly JsonNode[];
}

export interface JsonStringNode {
    readonly kind: 'string';
    readonly value: string;
    /** Source literal including quotes; absent on strings built by the walker */
    readonly raw?: string | undefined;
}

export interface JsonScalarNode {
    readonly kind: 'scalar';
    readonly raw: string;
}

export type JsonNode = JsonObjectNode | JsonArrayNode | JsonStringNode | JsonScalarNode;

// ── Reader ───────────────────────────────────────────────

export interface ParseJsonOptions {
    /** Deepest object/array nesting accepted. @default 256 */
    readonly maxDepth?: number;
}

const DEFAULT_MAX_DEPTH = 256;
const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const LITERALS = ['true', 'false', 'null'] as const;

/**
 * Parse a JSON document into an order-preserving tree.
 *
 * @throws {DetectionError} `MALFORMED_JSON` or `MAX_DEPTH_EXCEEDED`
 */
export function parseJsonDocument(text: string, options: ParseJsonOptions = {}): JsonNode {
    try {
        JSON.parse(text);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new DetectionError('MALFORMED_JSON', `Malformed JSON: ${message}`, { cause: err });
    }
    return new DocumentReader(text, options.maxDepth ?? DEFAULT_MAX_DEPTH).read();
}

class DocumentReader {
    private _pos = 0;

    constructor(
        private readonly _text: string,
        private readonly _maxDepth: number,
    ) {}

    read(): JsonNode {
        const node = this._value(0);
        this._skipWhitespace();
        if (this._pos !== this._text.length) this._fail('trailing content');
        return node;
    }

    private _value(depth: number): JsonNode {
        this._skipWhitespace();
        const ch = this._text[this._pos];
        switch (ch) {
            case '{': return this._object(depth + 1);
            case '[': return this._array(depth + 1);
            case '"': {
                const raw = this._stringLiteral();
                return { kind: 'string', value: decodeString(raw), raw };
            }
            default: return { kind: 'scalar', raw: this._scalar() };
        }
    }

    private _object(depth: number): JsonObjectNode {
        this._checkDepth(depth);
        this._pos++; // {
        const entries: JsonEntry[] = [];
        const positions = new Map<string, number>();

        this._skipWhitespace();
        if (this._text[this._pos] === '}') {
            this._pos++;
            return { kind: 'object', entries };
        }

        for (;;) {
            this._skipWhitespace();
            const key = decodeString(this._stringLiteral());
            this._skipWhitespace();
            this._expect(':');
            const value = this._value(depth);

            const existing = positions.get(key);
            if (existing === undefined) {
                positions.set(key, entries.length);
                entries.push({ key, value });
            } else {
                entries[existing] = { key, value };
            }

            this._skipWhitespace();
            if (this._text[this._pos] === ',') { this._pos++; continue; }
            this._expect('}');
            return { kind: 'object', entries };
        }
    }

    private _array(depth: number): JsonArrayNode {
        this._checkDepth(depth);
        this._pos++; // [
        const items: JsonNode[] = [];

        this._skipWhitespace();
        if (this._text[this._pos] === ']') {
            this._pos++;
            return { kind: 'array', items };
        }

        for (;;) {
            items.push(this._value(depth));
            this._skipWhitespace();
            if (this._text[this._pos] === ',') { this._pos++; continue; }
            this._expect(']');
            return { kind: 'array', items };
        }
    }

    private _stringLiteral(): string {
        const start = this._pos;
        this._expect('"');
        while (this._pos < this._text.length) {
            const ch = this._text[this._pos];
            if (ch === '\\') {
                this._pos += 2;
            } else if (ch === '"') {
                this._pos++;
                return this._text.slice(start, this._pos);
            } else {
                this._pos++;
            }
        }
        return this._fail('unterminated string');
    }

    private _scalar(): string {
        for (const literal of LITERALS) {
            if (this._text.startsWith(literal, this._pos)) {
                this._pos += literal.length;
                return literal;
            }
        }
        NUMBER.lastIndex = this._pos;
        const match = NUMBER.exec(this._text);
        if (!match) return this._fail('unexpected token');
        this._pos += match[0].length;
        return match[0];
    }

    private _skipWhitespace(): void {
        while (this._pos < this._text.length) {
            const ch = this._text[this._pos];
            if (ch !== ' ' && ch !== '\t' && ch !== '\n' && ch !== '\r') return;
            this._pos++;
        }
    }

    private _expect(ch: string): void {
        if (this._text[this._pos] !== ch) this._fail(`expected '${ch}'`);
        this._pos++;
    }

    private _checkDepth(depth: number): void {
        if (depth > this._maxDepth) {
            throw new DetectionError(
                'MAX_DEPTH_EXCEEDED',
                `JSON nesting exceeds the maximum depth of ${this._maxDepth}`,
            );
        }
    }

    private _fail(reason: string): never {
        throw new DetectionError('MALFORMED_JSON', `Malformed JSON: ${reason} at position ${this._pos}`);
    }
}

function decodeString(literal: string): string {
    const value: unknown = JSON.parse(literal);
    if (typeof value !== 'string') {
        throw new DetectionError('MALFORMED_JSON', `Malformed JSON: expected a string, got ${literal}`);
    }
    return value;
}

// ── Writer ───────────────────────────────────────────────

/**
 * Serialize a tree with `", "` and `": "` separators. Strings carrying a
 * source literal are written back as that literal; new strings are
 * escaped by `JSON.stringify`, which leaves non-ASCII characters as is.
 */
export function serializeJsonNode(node: JsonNode): string {
    switch (node.kind) {
        case 'object':
            return `{${node.entries
                .map(entry => `${JSON.stringify(entry.key)}: ${serializeJsonNode(entry.value)}`)
                .join(', ')}}`;
        case 'array':
            return `[${node.items.map(serializeJsonNode).join(', ')}]`;
        case 'string':
            return node.raw ?? JSON.stringify(node.value);
        case 'scalar':
            return node.raw;
    }
}
