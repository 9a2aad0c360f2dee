/**
 * CodeDetector: Public Entry Points
 *
 * Wraps high-confidence Python regions of free text or of every string
 * inside a JSON document in the configured delimiter tags, and reports
 * whether any security-sensitive construct was seen.
 *
 *   text ──► size cap ──► wrapCodeBlocks ─────────────────────► report
 *   json ──► size cap ──► parse ──► walkJson ──► revert rule ──► report
 *
 * Each call is independent: reports carry their own danger flag, so one
 * detector can serve concurrent callers.
 *
 * @example
 * ```typescript
 * import { CodeDetector } from '@snippet-warden/core';
 *
 * const detector = await CodeDetector.create({ threshold: 80 });
 * const report = detector.scanText(message);
 * if (report.dangerous) console.warn(report.dangerPatterns);
 * ```
 *
 * @module
 */
import type { GrammarProfile } from '../grammar/GrammarProfile.js';
import { loadPythonGrammar } from '../grammar/PythonGrammar.js';
import { findDangerousPatterns } from '../heuristics/DangerScanner.js';
import type { DebugObserverFn, DetectionMode } from '../observability/DebugObserver.js';
import { mean, wrapCodeBlocks } from '../pipeline/BlockWrapper.js';
import { parseJsonDocument, serializeJsonNode } from '../pipeline/JsonDocument.js';
import { walkJson } from '../pipeline/JsonTreeWalker.js';
import type { PipelineContext } from '../pipeline/PipelineContext.js';
import { WorkerPool } from '../pipeline/WorkerPool.js';
import { DetectionError } from './DetectionError.js';
import {
    clampThreshold,
    resolveConfig,
    DEFAULT_END_TAG,
    DEFAULT_START_TAG,
    type DetectorConfig,
    type DetectorOptions,
} from './DetectorConfig.js';

// ── Reports ──────────────────────────────────────────────

export interface TextDetectionReport {
    /** Input with wrapped blocks, or the input unchanged */
    readonly output: string;
    /** Mean block score (0 when no block was found) */
    readonly confidence: number;
    /** Whether `output` carries any wrap */
    readonly wrapped: boolean;
    /** Whether wraps were discarded because the mean fell below threshold */
    readonly reverted: boolean;
    readonly dangerous: boolean;
    /** Ids of the danger patterns found anywhere in the input */
    readonly dangerPatterns: readonly string[];
}

export interface JsonDetectionReport {
    /** Re-serialized document, or the input verbatim */
    readonly output: string;
    /** Mean of the string-field scores (0 when none was scored) */
    readonly confidence: number;
    readonly wrapped: boolean;
    /** Whether any string field was rewritten before the revert rule */
    readonly changed: boolean;
    readonly reverted: boolean;
    readonly dangerous: boolean;
    /** One entry per scored string field, in document order */
    readonly scores: readonly number[];
}

export interface JsonScanOptions {
    /** Overrides the configured `parallel` flag for this call */
    readonly parallel?: boolean | undefined;
}

export interface DetectorRuntime {
    /** Receives pipeline events; off when absent */
    readonly debug?: DebugObserverFn | undefined;
    /** Loaded through `loadPythonGrammar()` when absent */
    readonly grammar?: GrammarProfile | undefined;
}

// ── Detector ─────────────────────────────────────────────

export class CodeDetector {
    private _config: DetectorConfig;
    private readonly _grammar: GrammarProfile;
    private readonly _debug: DebugObserverFn | undefined;
    private readonly _pool: WorkerPool;

    /**
     * @throws {DetectionError} `INVALID_CONFIG` when `options` fail validation
     */
    constructor(grammar: GrammarProfile, options: DetectorOptions = {}, debug?: DebugObserverFn) {
        this._config = resolveConfig(options);
        this._grammar = grammar;
        this._debug = debug;
        this._pool = new WorkerPool({ maxWorkers: this._config.maxWorkers });
    }

    /**
     * Build a detector, loading the built-in Python grammar unless
     * `runtime.grammar` supplies one.
     *
     * @throws {DetectionError} `INVALID_CONFIG` when `options` fail validation
     */
    static async create(options: DetectorOptions = {}, runtime: DetectorRuntime = {}): Promise<CodeDetector> {
        const config = resolveConfig(options);
        const grammar = runtime.grammar ?? await loadPythonGrammar();
        return new CodeDetector(grammar, config, runtime.debug);
    }

    get config(): DetectorConfig {
        return this._config;
    }

    get threshold(): number {
        return this._config.threshold;
    }

    /** Values outside `[0, 100]` are clamped. */
    set threshold(value: number) {
        if (Number.isNaN(value)) {
            throw new DetectionError('INVALID_CONFIG', 'Threshold must be a number, got NaN');
        }
        this._config = Object.freeze({ ...this._config, threshold: clampThreshold(value) });
    }

    get grammar(): GrammarProfile {
        return this._grammar;
    }

    // ── Text mode ────────────────────────────────────────

    /**
     * @throws {DetectionError} `OVERSIZE_INPUT`
     */
    scanText(text: string): TextDetectionReport {
        const startedAt = performance.now();
        this._checkSize(text);

        const result = wrapCodeBlocks(text, this._config.startTag, this._config.endTag, this._context());
        const dangerPatterns = findDangerousPatterns(text, this._grammar).map(entry => entry.id);
        const report: TextDetectionReport = {
            output: result.text,
            confidence: result.confidence,
            wrapped: result.wrapped,
            reverted: result.reverted,
            dangerous: result.dangerous || dangerPatterns.length > 0,
            dangerPatterns,
        };

        this._emitDetect('text', report, startedAt);
        return report;
    }

    /** Text with high-confidence blocks wrapped. */
    detect(text: string): string {
        return this.scanText(text).output;
    }

    // ── JSON mode ────────────────────────────────────────

    /**
     * @throws {DetectionError} `OVERSIZE_INPUT`, `MALFORMED_JSON` or `MAX_DEPTH_EXCEEDED`
     */
    async scanJson(document: string, options: JsonScanOptions = {}): Promise<JsonDetectionReport> {
        const startedAt = performance.now();
        this._checkSize(document);

        const tree = parseJsonDocument(document, { maxDepth: this._config.maxDepth });
        const walked = await walkJson(tree, this._config.startTag, this._config.endTag, {
            context: this._context(),
            parallel: options.parallel ?? this._config.parallel,
            pool: this._pool,
            maxDepth: this._config.maxDepth,
        });

        const confidence = mean(walked.scores);
        const threshold = this._config.threshold;
        const base = { confidence, changed: walked.changed, dangerous: walked.dangerous, scores: walked.scores };

        let report: JsonDetectionReport;
        if (walked.wrapped && confidence < threshold) {
            this._debug?.({ type: 'revert', mode: 'json', confidence, threshold, timestamp: Date.now() });
            report = { ...base, output: document, wrapped: false, reverted: true };
        } else if (!walked.changed) {
            report = { ...base, output: document, wrapped: false, reverted: false };
        } else {
            report = { ...base, output: serializeJsonNode(walked.node), wrapped: walked.wrapped, reverted: false };
        }

        this._emitDetect('json', report, startedAt);
        return report;
    }

    /** JSON document with code in its string fields wrapped. */
    async detectJson(document: string, options: JsonScanOptions = {}): Promise<string> {
        return (await this.scanJson(document, options)).output;
    }

    // ── Private ──────────────────────────────────────────

    private _context(): PipelineContext {
        return { grammar: this._grammar, threshold: this._config.threshold, debug: this._debug };
    }

    private _checkSize(input: string): void {
        const bytes = Buffer.byteLength(input, 'utf8');
        if (bytes > this._config.maxInputSize) {
            throw new DetectionError(
                'OVERSIZE_INPUT',
                `Input is ${bytes} bytes; the limit is ${this._config.maxInputSize} bytes`,
            );
        }
    }

    private _emitDetect(
        mode: DetectionMode,
        report: { readonly confidence: number; readonly wrapped: boolean; readonly dangerous: boolean },
        startedAt: number,
    ): void {
        this._debug?.({
            type: 'detect',
            mode,
            confidence: report.confidence,
            wrapped: report.wrapped,
            dangerous: report.dangerous,
            durationMs: performance.now() - startedAt,
            timestamp: Date.now(),
        });
    }
}

// ── Free functions ───────────────────────────────────────

/**
 * One-shot text detection with default settings.
 */
export async function detect(
    text: string,
    startTag: string = DEFAULT_START_TAG,
    endTag: string = DEFAULT_END_TAG,
): Promise<string> {
    return (await CodeDetector.create({ startTag, endTag })).detect(text);
}

/**
 * One-shot JSON detection with default settings.
 */
export async function detectJson(
    document: string,
    startTag: string = DEFAULT_START_TAG,
    endTag: string = DEFAULT_END_TAG,
    parallel = false,
): Promise<string> {
    return (await CodeDetector.create({ startTag, endTag, parallel })).detectJson(document);
}
