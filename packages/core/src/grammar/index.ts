/** Grammar: Barrel Export */
export { defineGrammar } from './GrammarProfile.js';
export type {
    GrammarProfile,
    GrammarDefinition,
    DangerPattern,
    DangerCategory,
    ForeignMarkers,
    SyntaxCheckResult,
    SyntaxIssue,
} from './GrammarProfile.js';
export { loadPythonGrammar, PYTHON_STRONG_KEYWORDS, PYTHON_WEAK_KEYWORDS, PYTHON_DANGER_PATTERNS } from './PythonGrammar.js';
export { loadTreeSitterLanguage, createTreeSitterChecker } from './TreeSitterSyntaxChecker.js';
