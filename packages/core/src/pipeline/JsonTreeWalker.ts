/**
 * JsonTreeWalker: Run the String-Field Processor over a JSON Tree
 *
 * Every string value (object values and array items, at any depth) goes
 * through {@link processStringField}. Keys, numbers, booleans and null
 * pass through untouched. Outcomes are merged in document order:
 *
 *   scores     concatenated
 *   wrapped    OR
 *   changed    OR
 *   dangerous  OR
 *
 * Sequential mode processes the leaves one after another. Parallel mode
 * fans them out through a {@link WorkerPool}: each task takes a slot,
 * yields to the event loop, then scores its field, so up to
 * `maxWorkers` fields are in flight and interleave with other work on
 * the loop. Everything runs on one thread; there is no CPU parallelism.
 * The tree is rebuilt from the index-aligned results, so both modes
 * produce the same tree and the same score order.
 *
 * @module
 */
import { setImmediate as yieldToLoop } from 'node:timers/promises';
import { DetectionError } from '../detector/DetectionError.js';
import type { JsonNode, JsonStringNode } from './JsonDocument.js';
import type { PipelineContext } from './PipelineContext.js';
import { processStringField, type FieldResult } from './StringFieldProcessor.js';
import { WorkerPool } from './WorkerPool.js';

export interface WalkOptions {
    readonly context: PipelineContext;
    /** Interleave string fields through the worker pool. @default false */
    readonly parallel?: boolean | undefined;
    /** Pool to use in parallel mode; a pool of `maxWorkers` slots is created otherwise */
    readonly pool?: WorkerPool | undefined;
    /** @default 4 */
    readonly maxWorkers?: number | undefined;
    /** @default 256 */
    readonly maxDepth?: number | undefined;
}

export interface WalkResult {
    readonly node: JsonNode;
    readonly scores: readonly number[];
    readonly wrapped: boolean;
    readonly changed: boolean;
    readonly dangerous: boolean;
}

const DEFAULT_MAX_WORKERS = 4;
const DEFAULT_MAX_DEPTH = 256;

export async function walkJson(
    node: JsonNode,
    startTag: string,
    endTag: string,
    options: WalkOptions,
): Promise<WalkResult> {
    const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
    const leaves = collectStrings(node, maxDepth);

    let fields: readonly FieldResult[];
    if (options.parallel && leaves.length > 1) {
        const pool = options.pool ?? new WorkerPool({ maxWorkers: options.maxWorkers ?? DEFAULT_MAX_WORKERS });
        fields = await pool.mapInOrder(leaves, async leaf => {
            await yieldToLoop();
            return processStringField(leaf.value, startTag, endTag, options.context);
        });
    } else {
        fields = leaves.map(leaf => processStringField(leaf.value, startTag, endTag, options.context));
    }

    return assemble(node, fields);
}

// ── Leaf collection ──────────────────────────────────────

function collectStrings(root: JsonNode, maxDepth: number): JsonStringNode[] {
    const out: JsonStringNode[] = [];

    const visit = (node: JsonNode, depth: number): void => {
        switch (node.kind) {
            case 'string':
                out.push(node);
                return;
            case 'scalar':
                return;
            case 'object':
            case 'array': {
                if (depth + 1 > maxDepth) {
                    throw new DetectionError(
                        'MAX_DEPTH_EXCEEDED',
                        `JSON nesting exceeds the maximum depth of ${maxDepth}`,
                    );
                }
                const children = node.kind === 'object' ? node.entries.map(entry => entry.value) : node.items;
                for (const child of children) visit(child, depth + 1);
                return;
            }
        }
    };

    visit(root, 0);
    return out;
}

// ── Reassembly ───────────────────────────────────────────

/**
 * Rebuild the tree, consuming `fields` in the same document order that
 * {@link collectStrings} produced them.
 */
function assemble(root: JsonNode, fields: readonly FieldResult[]): WalkResult {
    const scores: number[] = [];
    let wrapped = false;
    let changed = false;
    let dangerous = false;
    let cursor = 0;

    const rebuild = (node: JsonNode): JsonNode => {
        switch (node.kind) {
            case 'string': {
                const field = fields[cursor++];
                if (field === undefined) throw new Error('JSON walker lost track of string fields');
                scores.push(...field.scores);
                wrapped ||= field.wrapped;
                changed ||= field.changed;
                dangerous ||= field.dangerous;
                return field.changed ? { kind: 'string', value: field.value } : node;
            }
            case 'scalar':
                return node;
            case 'object':
                return { kind: 'object', entries: node.entries.map(entry => ({ key: entry.key, value: rebuild(entry.value) })) };
            case 'array':
                return { kind: 'array', items: node.items.map(rebuild) };
        }
    };

    const node = rebuild(root);
    return { node, scores, wrapped, changed, dangerous };
}
