/** Detector: Barrel Export */
export { CodeDetector, detect, detectJson } from './CodeDetector.js';
export type { TextDetectionReport, JsonDetectionReport, JsonScanOptions, DetectorRuntime } from './CodeDetector.js';
export { DetectionError, isDetectionError } from './DetectionError.js';
export type { DetectionErrorCode } from './DetectionError.js';
export {
    DetectorConfigSchema,
    resolveConfig,
    clampThreshold,
    DEFAULT_START_TAG,
    DEFAULT_END_TAG,
    DEFAULT_THRESHOLD,
    DEFAULT_MAX_INPUT_SIZE,
    DEFAULT_MAX_WORKERS,
    DEFAULT_MAX_DEPTH,
} from './DetectorConfig.js';
export type { DetectorConfig, DetectorOptions } from './DetectorConfig.js';
export { loadConfig, applyCliOverrides, CONFIG_FILENAMES } from './ConfigLoader.js';
