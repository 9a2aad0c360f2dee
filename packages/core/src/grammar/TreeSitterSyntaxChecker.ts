/**
 * TreeSitterSyntaxChecker: Authoritative Parse via web-tree-sitter
 *
 * Grammars ship as prebuilt WASM modules in `tree-sitter-wasms`. The
 * runtime and each grammar load asynchronously, once per process;
 * parsing afterwards is synchronous, so the checker slots into the
 * synchronous scoring pipeline.
 *
 *   loadTreeSitterLanguage('tree-sitter-python.wasm') ──► Language
 *   createTreeSitterChecker(language) ──► (source) => SyntaxCheckResult
 *
 * A tree holding an ERROR or MISSING node is a failed parse. The
 * checker never throws: a parser failure is reported as a failed parse.
 *
 * @module
 */
import { createRequire } from 'node:module';
import { dirname, join } from 'node:path';
import Parser from 'web-tree-sitter';
import type { SyntaxCheckResult } from './GrammarProfile.js';

// Resolves WASM files shipped in tree-sitter-wasms/out/
const require = createRequire(import.meta.url);

let runtime: Promise<void> | undefined;
const languages = new Map<string, Promise<Parser.Language>>();

function initRuntime(): Promise<void> {
    runtime ??= Parser.init().catch((err: unknown) => {
        runtime = undefined;
        throw err;
    });
    return runtime;
}

function wasmDirectory(): string {
    return join(dirname(require.resolve('tree-sitter-wasms/package.json')), 'out');
}

/**
 * Load a grammar from `tree-sitter-wasms`. Concurrent callers share one
 * load; a failed load is retried on the next call.
 */
export function loadTreeSitterLanguage(wasmFile: string): Promise<Parser.Language> {
    let pending = languages.get(wasmFile);
    if (pending === undefined) {
        pending = initRuntime()
            .then(() => Parser.Language.load(join(wasmDirectory(), wasmFile)))
            .catch((err: unknown) => {
                languages.delete(wasmFile);
                throw err;
            });
        languages.set(wasmFile, pending);
    }
    return pending;
}

export function createTreeSitterChecker(language: Parser.Language): (source: string) => SyntaxCheckResult {
    const parser = new Parser();
    parser.setLanguage(language);

    return source => {
        let tree: Parser.Tree | undefined;
        try {
            tree = parser.parse(source);
            return describeTree(tree.rootNode);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            return { ok: false, issue: { message: `parser failure: ${message}`, line: 1 } };
        } finally {
            tree?.delete();
        }
    };
}

/** Follow the error flag down to the first ERROR or MISSING node. */
function describeTree(root: Parser.SyntaxNode): SyntaxCheckResult {
    if (!root.hasError) return { ok: true };

    let node = root;
    while (node.type !== 'ERROR' && !node.isMissing) {
        const next = node.children.find(child => child.hasError);
        if (next === undefined) break;
        node = next;
    }

    const message = node.isMissing ? `missing ${node.type}` : 'invalid syntax';
    return { ok: false, issue: { message, line: node.startPosition.row + 1 } };
}
