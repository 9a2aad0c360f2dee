/**
 * @snippet-warden/core: Public API
 *
 * Finds Python code in free text and JSON payloads, wraps confident
 * regions in delimiter tags and flags dangerous constructs.
 *
 * @module
 */

// ── Detector ─────────────────────────────────────────────
export {
    CodeDetector,
    detect,
    detectJson,
    DetectionError,
    isDetectionError,
    DetectorConfigSchema,
    resolveConfig,
    clampThreshold,
    loadConfig,
    applyCliOverrides,
    CONFIG_FILENAMES,
    DEFAULT_START_TAG,
    DEFAULT_END_TAG,
    DEFAULT_THRESHOLD,
    DEFAULT_MAX_INPUT_SIZE,
    DEFAULT_MAX_WORKERS,
    DEFAULT_MAX_DEPTH,
} from './detector/index.js';
export type {
    TextDetectionReport,
    JsonDetectionReport,
    JsonScanOptions,
    DetectorRuntime,
    DetectionErrorCode,
    DetectorConfig,
    DetectorOptions,
} from './detector/index.js';

// ── Grammar ──────────────────────────────────────────────
export {
    defineGrammar,
    loadPythonGrammar,
    PYTHON_STRONG_KEYWORDS,
    PYTHON_WEAK_KEYWORDS,
    PYTHON_DANGER_PATTERNS,
    loadTreeSitterLanguage,
    createTreeSitterChecker,
} from './grammar/index.js';
export type {
    GrammarProfile,
    GrammarDefinition,
    DangerPattern,
    DangerCategory,
    ForeignMarkers,
    SyntaxCheckResult,
    SyntaxIssue,
} from './grammar/index.js';

// ── Heuristics ───────────────────────────────────────────
export {
    isLineCodeLike,
    mightContainCode,
    hasForeignMarker,
    containsDangerousPattern,
    findDangerousPatterns,
    stripComments,
    formCodeBlocks,
    segmentLines,
    toCandidateBlocks,
    scoreBlock,
    dedent,
    SINGLE_LINE_SCORE,
    MULTI_LINE_SCORE,
    splitLinesKeepEnds,
} from './heuristics/index.js';
export type { BlockRange, CandidateBlock, BlockScore, ScoreBasis } from './heuristics/index.js';

// ── Pipeline ─────────────────────────────────────────────
export {
    wrapCodeBlocks,
    processStringField,
    interpretEscapedNewlines,
    reescapeNewlines,
    parseJsonDocument,
    serializeJsonNode,
    walkJson,
    WorkerPool,
} from './pipeline/index.js';
export type {
    WrapResult,
    FieldResult,
    JsonNode,
    JsonObjectNode,
    JsonArrayNode,
    JsonStringNode,
    JsonScalarNode,
    JsonEntry,
    WalkOptions,
    WalkResult,
    PipelineContext,
} from './pipeline/index.js';

// ── Observability ────────────────────────────────────────
export { createDebugObserver, formatDebugEvent } from './observability/index.js';
export type {
    DebugEvent,
    DebugObserverFn,
    DetectionMode,
    ScoreEvent,
    RevertEvent,
    SkipEvent,
    DangerEvent,
    DetectEvent,
} from './observability/index.js';
