/**
 * DebugObserver: Opt-In Tracing for the Detection Pipeline
 *
 * Structured, typed events emitted at each decision the pipeline
 * takes. Disabled by default: components only build an event when an
 * observer was supplied.
 *
 * Design principles:
 * - Pure function observer (no class hierarchy)
 * - Discriminated union events (exhaustive switch possible)
 * - Immutable event payloads (readonly)
 *
 * @example
 * ```typescript
 * import { CodeDetector, createDebugObserver } from '@snippet-warden/core';
 *
 * // Default: compact console.debug output
 * const detector = await CodeDetector.create({}, { debug: createDebugObserver() });
 *
 * // Custom handler (e.g. forward to telemetry)
 * const detector = await CodeDetector.create({}, {
 *     debug: createDebugObserver((event) => telemetry.track(event.type, event)),
 * });
 * ```
 *
 * @module
 */
import type { DangerCategory } from '../grammar/GrammarProfile.js';
import type { ScoreBasis } from '../heuristics/ConfidenceScorer.js';

// ============================================================================
// Event Types (Discriminated Union)
// ============================================================================

/** Which entry point produced an event. */
export type DetectionMode = 'text' | 'json';

/**
 * Emitted once per candidate block after scoring.
 */
export interface ScoreEvent {
    readonly type: 'score';
    /** First line of the block (0-based, inclusive) */
    readonly start: number;
    /** Last line of the block (0-based, inclusive) */
    readonly end: number;
    readonly score: number;
    readonly basis: ScoreBasis;
    /** Whether the block cleared the threshold and was wrapped locally */
    readonly wrapped: boolean;
    readonly timestamp: number;
}

/**
 * Emitted when local wraps are discarded because the mean confidence
 * fell below the threshold.
 */
export interface RevertEvent {
    readonly type: 'revert';
    readonly mode: DetectionMode;
    readonly confidence: number;
    readonly threshold: number;
    readonly timestamp: number;
}

/**
 * Emitted when a JSON string field is passed through without scoring.
 */
export interface SkipEvent {
    readonly type: 'skip';
    /** `short`: under the length floor. `no-signal`: pre-filter and danger scan both quiet. */
    readonly reason: 'short' | 'no-signal';
    readonly length: number;
    readonly timestamp: number;
}

/**
 * Emitted when a span matches the danger catalogue.
 */
export interface DangerEvent {
    readonly type: 'danger';
    /** Catalogue ids that matched, in catalogue order */
    readonly patterns: readonly string[];
    readonly categories: readonly DangerCategory[];
    readonly timestamp: number;
}

/**
 * Emitted when a public entry point completes.
 */
export interface DetectEvent {
    readonly type: 'detect';
    readonly mode: DetectionMode;
    readonly confidence: number;
    readonly wrapped: boolean;
    readonly dangerous: boolean;
    /** Milliseconds spent in the call */
    readonly durationMs: number;
    readonly timestamp: number;
}

/**
 * Union of all debug event types.
 *
 * ```typescript
 * function handle(event: DebugEvent) {
 *     switch (event.type) {
 *         case 'score':  // ScoreEvent
 *         case 'revert': // RevertEvent
 *         case 'skip':   // SkipEvent
 *         case 'danger': // DangerEvent
 *         case 'detect': // DetectEvent
 *     }
 * }
 * ```
 */
export type DebugEvent =
    | ScoreEvent
    | RevertEvent
    | SkipEvent
    | DangerEvent
    | DetectEvent;

/**
 * Observer function that receives debug events.
 */
export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer with compact console output.
 *
 * If a custom handler is provided, events are forwarded to it instead.
 *
 * ```
 * [snippet-warden] score     lines 2-5 100 (parse) wrapped
 * [snippet-warden] revert    text mean 40.0 < 70
 * [snippet-warden] detect    text ✓ 100.0 0.4ms
 * ```
 *
 * @param handler - Optional custom event handler. If omitted, uses `console.debug`.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    return (event: DebugEvent): void => {
        console.debug(formatDebugEvent(event));
    };
}

/** Render one event as a single log line. */
export function formatDebugEvent(event: DebugEvent): string {
    const prefix = '[snippet-warden]';

    switch (event.type) {
        case 'score': {
            const lines = event.start === event.end ? `line ${event.start}` : `lines ${event.start}-${event.end}`;
            const verdict = event.wrapped ? 'wrapped' : 'kept';
            return `${prefix} score     ${lines} ${event.score} (${event.basis}) ${verdict}`;
        }

        case 'revert':
            return `${prefix} revert    ${event.mode} mean ${event.confidence.toFixed(1)} < ${event.threshold}`;

        case 'skip':
            return `${prefix} skip      ${event.reason} (${event.length} chars)`;

        case 'danger':
            return `${prefix} DANGER    ${event.patterns.join(', ')}`;

        case 'detect': {
            const icon = event.wrapped ? '✓' : '·';
            const danger = event.dangerous ? ' ⚠ dangerous' : '';
            return `${prefix} detect    ${event.mode} ${icon} ${event.confidence.toFixed(1)}${danger} ${event.durationMs.toFixed(1)}ms`;
        }
    }
}
