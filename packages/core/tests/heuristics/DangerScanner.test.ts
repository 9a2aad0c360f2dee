/**
 * DangerScanner: case-insensitive catalogue matches
 */
import { describe, it, expect } from 'vitest';
import { containsDangerousPattern, findDangerousPatterns } from '../../src/heuristics/DangerScanner.js';
import { loadPythonGrammar } from '../../src/grammar/PythonGrammar.js';

const python = await loadPythonGrammar();

const dangerous = (text: string): boolean => containsDangerousPattern(text, python);

describe('DangerScanner: containsDangerousPattern', () => {
    it('should flag process execution in any case', () => {
        expect(dangerous("os.system('ls')")).toBe(true);
        expect(dangerous("OS.SYSTEM ('ls')")).toBe(true);
        expect(dangerous('subprocess.Popen(cmd)')).toBe(true);
    });

    it('should flag dynamic evaluation but not look-alike names', () => {
        expect(dangerous('eval(data)')).toBe(true);
        expect(dangerous('exec (code)')).toBe(true);
        expect(dangerous('evaluate(data)')).toBe(false);
    });

    it('should treat non-ASCII letters as part of a name', () => {
        expect(dangerous('éeval(x)')).toBe(false);
        expect(dangerous('данныеexec(x)')).toBe(false);
        expect(dangerous('_eval(x)')).toBe(false);
        expect(dangerous('é eval(x)')).toBe(true);
        expect(dangerous('(eval(x))')).toBe(true);
    });

    it('should flag shell idioms inside prose', () => {
        expect(dangerous('never run rm   -rf on a shared box')).toBe(true);
    });

    it('should ignore harmless text', () => {
        expect(dangerous('I like this and that')).toBe(false);
        expect(dangerous('import os\nprint(os.name)')).toBe(false);
    });
});

describe('DangerScanner: findDangerousPatterns', () => {
    it('should list distinct matches in catalogue order', () => {
        const text = "data = pickle.loads(blob)\nsubprocess.run(['ls'])\nresult = eval(expr)";
        expect(findDangerousPatterns(text, python).map(entry => entry.id)).toEqual([
            'subprocess',
            'eval',
            'pickle',
        ]);
    });

    it('should expose categories', () => {
        const matches = findDangerousPatterns('sock = socket.socket()', python);
        expect(matches.map(entry => [entry.id, entry.category])).toEqual([['socket', 'network']]);
    });
});
