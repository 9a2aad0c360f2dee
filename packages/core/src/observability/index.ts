/** Observability: Barrel Export */
export { createDebugObserver, formatDebugEvent } from './DebugObserver.js';
export type {
    DebugEvent,
    DebugObserverFn,
    DetectionMode,
    ScoreEvent,
    RevertEvent,
    SkipEvent,
    DangerEvent,
    DetectEvent,
} from './DebugObserver.js';
