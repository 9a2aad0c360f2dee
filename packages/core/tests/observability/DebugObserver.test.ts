/**
 * DebugObserver: event formatting and observer factory
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    createDebugObserver,
    formatDebugEvent,
    type DebugEvent,
} from '../../src/observability/DebugObserver.js';

const T = 1_700_000_000_000;

describe('DebugObserver: formatDebugEvent', () => {
    it('should format a multi-line score event', () => {
        expect(formatDebugEvent({ type: 'score', start: 2, end: 5, score: 100, basis: 'parse', wrapped: true, timestamp: T }))
            .toBe('[snippet-warden] score     lines 2-5 100 (parse) wrapped');
    });

    it('should format a single-line score event', () => {
        expect(formatDebugEvent({ type: 'score', start: 3, end: 3, score: 0, basis: 'none', wrapped: false, timestamp: T }))
            .toBe('[snippet-warden] score     line 3 0 (none) kept');
    });

    it('should format revert and skip events', () => {
        expect(formatDebugEvent({ type: 'revert', mode: 'json', confidence: 86.666, threshold: 90, timestamp: T }))
            .toBe('[snippet-warden] revert    json mean 86.7 < 90');
        expect(formatDebugEvent({ type: 'skip', reason: 'short', length: 3, timestamp: T }))
            .toBe('[snippet-warden] skip      short (3 chars)');
    });

    it('should format danger events', () => {
        expect(formatDebugEvent({
            type: 'danger',
            patterns: ['os.system', 'rm-rf'],
            categories: ['process', 'filesystem'],
            timestamp: T,
        })).toBe('[snippet-warden] DANGER    os.system, rm-rf');
    });

    it('should format detect events', () => {
        expect(formatDebugEvent({
            type: 'detect', mode: 'text', confidence: 100, wrapped: true, dangerous: false, durationMs: 0.42, timestamp: T,
        })).toBe('[snippet-warden] detect    text ✓ 100.0 0.4ms');
        expect(formatDebugEvent({
            type: 'detect', mode: 'json', confidence: 0, wrapped: false, dangerous: true, durationMs: 1.25, timestamp: T,
        })).toBe('[snippet-warden] detect    json · 0.0 ⚠ dangerous 1.3ms');
    });
});

describe('DebugObserver: createDebugObserver', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should return a custom handler as is', () => {
        const handler = vi.fn<(event: DebugEvent) => void>();
        expect(createDebugObserver(handler)).toBe(handler);
    });

    it('should log formatted lines to console.debug by default', () => {
        const spy = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
        createDebugObserver()({ type: 'skip', reason: 'no-signal', length: 11, timestamp: T });
        expect(spy).toHaveBeenCalledWith('[snippet-warden] skip      no-signal (11 chars)');
    });
});
