/**
 * BlockSegmenter: contiguous candidate blocks from a line stream
 *
 * Covers:
 *  - Blocks continued by blank and indented lines
 *  - Several blocks separated by prose
 *  - Blocks running to the end of input
 *  - Ranges strictly increasing and non-overlapping
 */
import { describe, it, expect } from 'vitest';
import { formCodeBlocks, segmentLines, toCandidateBlocks } from '../../src/heuristics/BlockSegmenter.js';
import { splitLinesKeepEnds } from '../../src/heuristics/lines.js';
import { loadPythonGrammar } from '../../src/grammar/PythonGrammar.js';

const python = await loadPythonGrammar();

describe('BlockSegmenter: formCodeBlocks', () => {
    it('should continue a block through indented and blank lines', () => {
        const text = 'Intro line here\nimport os\n    x = 1\n\nprint(x)\nThe end\n';
        expect(formCodeBlocks(text, python)).toEqual([{ start: 1, end: 4 }]);
    });

    it('should split blocks at a prose line', () => {
        const text = 'import os\nSome prose\nprint(1)\n';
        expect(formCodeBlocks(text, python)).toEqual([
            { start: 0, end: 0 },
            { start: 2, end: 2 },
        ]);
    });

    it('should close an open block at the end of input', () => {
        expect(formCodeBlocks('Look:\ndef f():\n    return 1', python)).toEqual([{ start: 1, end: 2 }]);
    });

    it('should find nothing in prose', () => {
        expect(formCodeBlocks('I like this and that', python)).toEqual([]);
        expect(formCodeBlocks('', python)).toEqual([]);
    });

    it('should produce increasing, non-overlapping ranges', () => {
        const text = 'import a\nnote\nimport b\nnote\nimport c\n';
        const blocks = formCodeBlocks(text, python);
        expect(blocks).toHaveLength(3);
        for (let i = 1; i < blocks.length; i++) {
            const previous = blocks[i - 1];
            const current = blocks[i];
            expect(previous && current && previous.end < current.start).toBe(true);
        }
    });

    it('should not open a block on an indented prose line', () => {
        expect(formCodeBlocks('    just some words\n', python)).toEqual([]);
    });
});

describe('BlockSegmenter: toCandidateBlocks', () => {
    it('should attach the block text with terminators', () => {
        const lines = splitLinesKeepEnds('hello\nimport os\r\nos.getcwd()\nbye');
        const ranges = segmentLines(lines, python);
        expect(toCandidateBlocks(lines, ranges)).toEqual([
            { start: 1, end: 1, text: 'import os\r\n' },
        ]);
    });
});
