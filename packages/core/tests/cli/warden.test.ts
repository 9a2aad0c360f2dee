/**
 * CLI `warden`: Argument Parsing and In-Process Runs
 *
 * Tests:
 *   - `parseArgs` - flags, aliases, positional file
 *   - `formatReport` - stderr summary
 *   - `run` - driven through a fake {@link CliIO}: output, exit codes,
 *     config overrides and error mapping
 *
 * @module
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
    parseArgs,
    formatReport,
    run,
    HELP,
    EXIT_OK,
    EXIT_ERROR,
    EXIT_DANGER,
} from '../../src/cli/warden.js';
import type { CliArgs, CliIO } from '../../src/cli/warden.js';

const argv = (...args: string[]): string[] => ['node', 'warden', ...args];

// ============================================================================
// parseArgs
// ============================================================================

describe('CLI warden: parseArgs', () => {
    it('should default every flag', () => {
        expect(parseArgs(argv())).toEqual({
            file: undefined,
            json: false,
            parallel: false,
            threshold: undefined,
            startTag: undefined,
            endTag: undefined,
            config: undefined,
            report: false,
            failOnDanger: false,
            debug: false,
            help: false,
        });
    });

    it('should parse every flag and alias', () => {
        const args = parseArgs(argv(
            'payload.json', '--json', '--parallel', '-t', '85',
            '--start-tag', '[py]', '--end-tag', '[/py]', '-c', 'warden.yaml',
            '--report', '--fail-on-danger', '--debug',
        ));
        expect(args).toEqual({
            file: 'payload.json',
            json: true,
            parallel: true,
            threshold: 85,
            startTag: '[py]',
            endTag: '[/py]',
            config: 'warden.yaml',
            report: true,
            failOnDanger: true,
            debug: true,
            help: false,
        });
    });

    it('should keep the first positional argument as the file', () => {
        expect(parseArgs(argv('a.txt', 'b.txt')).file).toBe('a.txt');
    });

    it('should recognize -h and --help', () => {
        expect(parseArgs(argv('-h')).help).toBe(true);
        expect(parseArgs(argv('--help')).help).toBe(true);
    });

    it('should reject a non-numeric or missing threshold', () => {
        expect(() => parseArgs(argv('--threshold', 'abc'))).toThrow('--threshold expects a number, got "abc"');
        expect(() => parseArgs(argv('-t'))).toThrow('--threshold expects a number, got ""');
    });
});

// ============================================================================
// formatReport
// ============================================================================

describe('CLI warden: formatReport', () => {
    it('should list every field', () => {
        expect(formatReport({ mode: 'text', confidence: 100, wrapped: true, reverted: false, dangerous: false })).toBe([
            '  mode        text',
            '  confidence  100.0',
            '  wrapped     yes',
            '  reverted    no',
            '  dangerous   no',
        ].join('\n'));
    });

    it('should append matched patterns', () => {
        const report = formatReport({
            mode: 'json',
            confidence: 0,
            wrapped: false,
            reverted: false,
            dangerous: true,
            dangerPatterns: ['eval', 'pickle'],
        });
        expect(report.split('\n').at(-1)).toBe('  patterns    eval, pickle');
    });
});

// ============================================================================
// run
// ============================================================================

describe('CLI warden: run', () => {
    let tmpDir: string;

    beforeEach(() => {
        tmpDir = join(tmpdir(), `warden-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
        mkdirSync(tmpDir, { recursive: true });
    });

    afterEach(() => {
        rmSync(tmpDir, { recursive: true, force: true });
    });

    function fakeIO(input: string | Error): { io: CliIO; out: string[]; err: string[]; files: Array<string | undefined> } {
        const out: string[] = [];
        const err: string[] = [];
        const files: Array<string | undefined> = [];
        const io: CliIO = {
            cwd: tmpDir,
            readInput: async file => {
                files.push(file);
                if (input instanceof Error) throw input;
                return input;
            },
            stdout: text => { out.push(text); },
            stderr: text => { err.push(text); },
        };
        return { io, out, err, files };
    }

    const args = (...flags: string[]): CliArgs => parseArgs(argv(...flags));

    it('should print help and exit 0', async () => {
        const { io, out, files } = fakeIO('');
        await expect(run(args('--help'), io)).resolves.toBe(EXIT_OK);
        expect(out).toEqual([`${HELP}\n`]);
        expect(files).toEqual([]);
    });

    it('should wrap code read from the input file', async () => {
        const { io, out, err, files } = fakeIO("def greet():\n    print('Hello')");
        await expect(run(args('notes.txt'), io)).resolves.toBe(EXIT_OK);
        expect(files).toEqual(['notes.txt']);
        expect(out).toEqual(["<PythonCode>def greet():\n    print('Hello')</PythonCode>"]);
        expect(err).toEqual([]);
    });

    it('should scan JSON with --json', async () => {
        const { io, out } = fakeIO('{"code": "import os", "n": 1}');
        await expect(run(args('--json'), io)).resolves.toBe(EXIT_OK);
        expect(out).toEqual(['{"code": "<PythonCode>import os</PythonCode>", "n": 1}']);
    });

    it('should apply --threshold and tag overrides', async () => {
        const high = fakeIO('import os');
        await run(args('-t', '90'), high.io);
        expect(high.out).toEqual(['import os']);

        const tagged = fakeIO('import os');
        await run(args('--start-tag', '[py]', '--end-tag', '[/py]'), tagged.io);
        expect(tagged.out).toEqual(['[py]import os[/py]']);
    });

    it('should read the config file from cwd', async () => {
        writeFileSync(join(tmpDir, 'snippet-warden.yaml'), 'startTag: "<py>"\nendTag: "</py>"\n');
        const { io, out } = fakeIO('import os');
        await run(args(), io);
        expect(out).toEqual(['<py>import os</py>']);
    });

    it('should exit 2 with --fail-on-danger when danger is found', async () => {
        const text = "os.system('rm -rf /')";
        const { io, out } = fakeIO(text);
        await expect(run(args('--fail-on-danger'), io)).resolves.toBe(EXIT_DANGER);
        expect(out).toEqual([text]);

        const quiet = fakeIO(text);
        await expect(run(args(), quiet.io)).resolves.toBe(EXIT_OK);
    });

    it('should print a report on stderr with --report', async () => {
        const { io, err } = fakeIO("os.system('rm -rf /')");
        await run(args('--report'), io);
        expect(err).toEqual([[
            '  mode        text',
            '  confidence  0.0',
            '  wrapped     no',
            '  reverted    no',
            '  dangerous   yes',
            '  patterns    os.system, rm-rf',
        ].join('\n') + '\n']);
    });

    it('should stream debug events to stderr with --debug', async () => {
        const { io, err } = fakeIO('import os');
        await run(args('--debug'), io);
        expect(err[0]).toBe('[snippet-warden] score     line 0 80 (parse) wrapped\n');
        expect(err[1]).toMatch(/^\[snippet-warden\] detect {4}text ✓ 80\.0 \d+\.\dms\n$/);
    });

    it('should map detection errors to exit 1', async () => {
        const { io, out, err } = fakeIO('{"a": ');
        await expect(run(args('--json'), io)).resolves.toBe(EXIT_ERROR);
        expect(out).toEqual([]);
        expect(err).toHaveLength(1);
        expect(err[0]).toMatch(/^Error \[MALFORMED_JSON\]: Malformed JSON: /);
    });

    it('should report a missing config file', async () => {
        const { io, err } = fakeIO('import os');
        await expect(run(args('-c', 'absent.yaml'), io)).resolves.toBe(EXIT_ERROR);
        expect(err).toEqual([`Error [CONFIG_NOT_FOUND]: Config file not found: "${join(tmpDir, 'absent.yaml')}"\n`]);
    });

    it('should report unreadable input', async () => {
        const { io, err } = fakeIO(new Error('no such file'));
        await expect(run(args('gone.txt'), io)).resolves.toBe(EXIT_ERROR);
        expect(err).toEqual(['Error: cannot read gone.txt: no such file\n']);

        const stdin = fakeIO(new Error('closed'));
        await run(args(), stdin.io);
        expect(stdin.err).toEqual(['Error: cannot read stdin: closed\n']);
    });
});
