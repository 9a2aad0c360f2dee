/**
 * DetectorConfig: Options Accepted by the Detector
 *
 * Validated with zod. Every field is optional on input and filled from
 * the defaults below; `threshold` is clamped into `[0, 100]` rather
 * than rejected.
 *
 * Can be loaded from `snippet-warden.yaml` (see {@link loadConfig})
 * or passed programmatically.
 *
 * @module
 */
import { z } from 'zod';
import { DetectionError } from './DetectionError.js';

// ── Defaults ─────────────────────────────────────────────

export const DEFAULT_START_TAG = '<PythonCode>';
export const DEFAULT_END_TAG = '</PythonCode>';
export const DEFAULT_THRESHOLD = 70;
/** 5 MiB, measured in UTF-8 bytes */
export const DEFAULT_MAX_INPUT_SIZE = 5 * 1024 * 1024;
export const DEFAULT_MAX_WORKERS = 4;
export const DEFAULT_MAX_DEPTH = 256;

// ── Schema ───────────────────────────────────────────────

export function clampThreshold(value: number): number {
    return Math.max(0, Math.min(100, value));
}

export const DetectorConfigSchema = z.object({
    /** Inserted before each wrapped block */
    startTag: z.string().default(DEFAULT_START_TAG),
    /** Inserted after each wrapped block */
    endTag: z.string().default(DEFAULT_END_TAG),
    /** Minimum block score to wrap, and minimum mean score to keep the wraps */
    threshold: z.number().default(DEFAULT_THRESHOLD).transform(clampThreshold),
    /** Interleave JSON string fields through the worker pool (one thread, same output) */
    parallel: z.boolean().default(false),
    /** Inputs larger than this many UTF-8 bytes are rejected */
    maxInputSize: z.number().int().positive().default(DEFAULT_MAX_INPUT_SIZE),
    maxWorkers: z.number().int().min(1).default(DEFAULT_MAX_WORKERS),
    /** Deepest JSON object/array nesting accepted */
    maxDepth: z.number().int().min(1).default(DEFAULT_MAX_DEPTH),
}).strict();

/** What callers may pass (every field optional). */
export type DetectorOptions = z.input<typeof DetectorConfigSchema>;

/** Fully resolved configuration. */
export type DetectorConfig = Readonly<z.output<typeof DetectorConfigSchema>>;

/**
 * Validate options and fill defaults.
 *
 * @throws {DetectionError} `INVALID_CONFIG` listing every failing field
 */
export function resolveConfig(options: unknown = {}): DetectorConfig {
    const result = DetectorConfigSchema.safeParse(options);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('; ');
        throw new DetectionError('INVALID_CONFIG', `Invalid detector configuration: ${details}`, {
            cause: result.error,
        });
    }
    return Object.freeze(result.data);
}
