/**
 * Detection properties that hold across inputs
 *
 *   - Re-scanning wrapped output never raises confidence
 *   - Below-threshold texts come back byte-for-byte
 *   - Parallel JSON output equals sequential output
 *   - Size cap boundary (one byte either side)
 *   - Danger flag independent of wrapping
 */
import { describe, it, expect } from 'vitest';
import { CodeDetector } from '../../src/detector/CodeDetector.js';
import { loadPythonGrammar } from '../../src/grammar/PythonGrammar.js';

const python = await loadPythonGrammar();

const SAMPLES = [
    "def greet():\n    print('Hello')",
    'import os',
    'Intro line\nfor item in items:\n    total += item\n\nDone.',
    'I like this and that',
];

describe('Detection Properties', () => {
    it('re-scanning wrapped output should not raise confidence', () => {
        const detector = new CodeDetector(python);
        for (const sample of SAMPLES) {
            const first = detector.scanText(sample);
            const second = detector.scanText(first.output);
            expect(second.confidence).toBeLessThanOrEqual(first.confidence);
        }
    });

    it('prose should be a fixed point', () => {
        const detector = new CodeDetector(python);
        const once = detector.detect('I like this and that');
        expect(detector.detect(once)).toBe('I like this and that');
    });

    it('a below-threshold mean should return the input exactly', () => {
        const text = 'import os\r\nprint(1)\r\nnote\r\nimport sys\r\nnote\r\nimport re';
        const report = new CodeDetector(python, { threshold: 90 }).scanText(text);
        expect(report.confidence).toBeLessThan(90);
        expect(report.output).toBe(text);
    });

    it('parallel and sequential JSON scans should be byte-identical', async () => {
        const fields = Array.from({ length: 12 }, (_, i) =>
            i % 3 === 0 ? `def f${i}():\n    return ${i}` : i % 3 === 1 ? `plain words ${i} here` : `import m${i}`);
        const document = JSON.stringify({ fields, nested: { fields } });
        const detector = new CodeDetector(python, { maxWorkers: 3 });

        const sequential = await detector.detectJson(document);
        const parallel = await detector.detectJson(document, { parallel: true });
        expect(parallel).toBe(sequential);
    });

    it('the size cap should accept one byte under and reject one byte over', () => {
        const detector = new CodeDetector(python, { maxInputSize: 16 });
        expect(() => detector.detect('a'.repeat(15))).not.toThrow();
        expect(() => detector.detect('a'.repeat(17))).toThrow('Input is 17 bytes; the limit is 16 bytes');
    });

    it('eval in prose should be flagged but never wrapped', () => {
        const report = new CodeDetector(python).scanText('Please eval(x) later');
        expect(report).toMatchObject({
            output: 'Please eval(x) later',
            confidence: 0,
            wrapped: false,
            dangerous: true,
            dangerPatterns: ['eval'],
        });
    });
});
