/**
 * Python Grammar: Built-in Profile for Python Snippets
 *
 * Keyword tiers, foreign-language markers, the compound-statement
 * header pattern and the danger catalogue used by default. The parse
 * step runs tree-sitter's Python grammar, so the profile is loaded
 * asynchronously through {@link loadPythonGrammar}.
 *
 * @module
 */
import { defineGrammar, type DangerPattern, type GrammarProfile } from './GrammarProfile.js';
import { createTreeSitterChecker, loadTreeSitterLanguage } from './TreeSitterSyntaxChecker.js';

/** Keywords that reliably indicate Python code on a line. */
export const PYTHON_STRONG_KEYWORDS: readonly string[] = [
    'def', 'class', 'import', 'from', 'if', 'elif', 'else', 'try', 'except',
    'with', 'for', 'while', 'return', 'print', 'lambda', 'yield', 'assert',
    'nonlocal', 'global', 'raise', 'async', 'await', 'pass', 'continue', 'break',
];

/** Keywords too common in prose to qualify a line on their own. */
export const PYTHON_WEAK_KEYWORDS: readonly string[] = ['in', 'is', 'and', 'or', 'not'];

/**
 * Security-sensitive calls and shell idioms.
 * Matched anywhere in the text, regardless of code-likeness. A name
 * must not follow a Unicode letter, digit or underscore.
 */
export const PYTHON_DANGER_PATTERNS: readonly DangerPattern[] = [
    { id: 'os.system', category: 'process', pattern: /(?<![\p{L}\p{N}_])os\.system\s*\(/iu },
    { id: 'subprocess', category: 'process', pattern: /(?<![\p{L}\p{N}_])subprocess\.(?:run|call|Popen)/iu },
    { id: 'eval', category: 'eval', pattern: /(?<![\p{L}\p{N}_])eval\s*\(/iu },
    { id: 'exec', category: 'eval', pattern: /(?<![\p{L}\p{N}_])exec\s*\(/iu },
    { id: 'shutil.rmtree', category: 'filesystem', pattern: /(?<![\p{L}\p{N}_])shutil\.rmtree\s*\(/iu },
    { id: 'rm-rf', category: 'filesystem', pattern: /rm\s+-rf/iu },
    { id: 'urllib', category: 'network', pattern: /(?<![\p{L}\p{N}_])urllib\.(?:request|urlopen)/iu },
    { id: 'requests', category: 'network', pattern: /(?<![\p{L}\p{N}_])requests?\.[A-Za-z_]+/iu },
    { id: 'socket', category: 'network', pattern: /(?<![\p{L}\p{N}_])socket\.[A-Za-z_]+/iu },
    { id: 'pickle', category: 'deserialization', pattern: /(?<![\p{L}\p{N}_])pickle\.(?:load|loads)/iu },
    { id: 'marshal', category: 'deserialization', pattern: /(?<![\p{L}\p{N}_])marshal\.(?:load|loads)/iu },
];

const PYTHON_WASM = 'tree-sitter-python.wasm';

let pythonGrammar: Promise<GrammarProfile> | undefined;

/**
 * Load the built-in Python profile. The tree-sitter runtime and the
 * Python grammar are read once; every caller shares the same frozen
 * profile.
 */
export function loadPythonGrammar(): Promise<GrammarProfile> {
    pythonGrammar ??= loadTreeSitterLanguage(PYTHON_WASM).then(
        language => defineGrammar({
            name: 'python',
            strongKeywords: PYTHON_STRONG_KEYWORDS,
            weakKeywords: PYTHON_WEAK_KEYWORDS,
            foreignMarkers: {
                substrings: ['function ', 'console.'],
                characters: '{};',
            },
            commentMarker: '#',
            blockHeader: /^\s*(?:def|class|if|elif|else|try|except|with|for|while)\b.*:\s*$/,
            dangerPatterns: PYTHON_DANGER_PATTERNS,
            checkSyntax: createTreeSitterChecker(language),
        }),
        (err: unknown) => {
            pythonGrammar = undefined;
            throw err;
        },
    );
    return pythonGrammar;
}
