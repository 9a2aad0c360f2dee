/**
 * Errors raised by the public entry points.
 *
 * A flagged danger pattern is reported, never thrown. Parse failures
 * inside the scorer are absorbed by the keyword fallback.
 *
 * @module
 */

export type DetectionErrorCode =
    | 'OVERSIZE_INPUT'
    | 'MALFORMED_JSON'
    | 'MAX_DEPTH_EXCEEDED'
    | 'INVALID_CONFIG'
    | 'CONFIG_NOT_FOUND';

export class DetectionError extends Error {
    readonly code: DetectionErrorCode;

    constructor(code: DetectionErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'DetectionError';
        this.code = code;
    }
}

/** Narrow an unknown thrown value. */
export function isDetectionError(error: unknown): error is DetectionError {
    return error instanceof DetectionError;
}
