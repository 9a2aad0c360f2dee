#!/usr/bin/env node
/**
 * snippet-warden CLI: `warden`
 *
 *   warden [file] [options]
 *
 * Reads a file (or stdin), wraps detected Python code in the configured
 * tags and writes the result to stdout. Summaries and debug events go
 * to stderr so piped output stays clean.
 *
 * Exit codes:
 *   0  success
 *   1  invalid arguments, unreadable input or a detection error
 *   2  `--fail-on-danger` and a dangerous construct was found
 *
 * @module
 */
import { readFile } from 'node:fs/promises';
import { CodeDetector } from '../detector/CodeDetector.js';
import { applyCliOverrides, loadConfig } from '../detector/ConfigLoader.js';
import { DetectionError } from '../detector/DetectionError.js';
import type { DetectorOptions } from '../detector/DetectorConfig.js';
import { createDebugObserver, formatDebugEvent } from '../observability/DebugObserver.js';

// ============================================================================
// Constants
// ============================================================================

/** @internal exported for testing */
export const EXIT_OK = 0;
/** @internal exported for testing */
export const EXIT_ERROR = 1;
/** @internal exported for testing */
export const EXIT_DANGER = 2;

/** @internal exported for testing */
export const HELP = `
warden: wrap Python code found in text or JSON

USAGE
  warden [file] [options]           Read <file> (or stdin), write result to stdout

OPTIONS
  --json                  Treat input as a JSON document
  --parallel              Interleave JSON string fields on the event loop
                          (no threads; output is identical)
  --threshold, -t <n>     Confidence threshold, 0-100 (default: 70)
  --start-tag <s>         Tag inserted before a block (default: <PythonCode>)
  --end-tag <s>           Tag inserted after a block (default: </PythonCode>)
  --config, -c <path>     Config file (default: snippet-warden.yaml in cwd)
  --report                Print a summary on stderr
  --fail-on-danger        Exit with code 2 when a dangerous construct is found
  --debug                 Print pipeline events on stderr
  --help, -h              Show this help message

EXAMPLES
  warden notes.txt
  warden payload.json --json --report
  cat message.txt | warden --threshold 90 --fail-on-danger
`.trim();

// ============================================================================
// Arg Parser
// ============================================================================

/** @internal exported for testing */
export interface CliArgs {
    file: string | undefined;
    json: boolean;
    parallel: boolean;
    threshold: number | undefined;
    startTag: string | undefined;
    endTag: string | undefined;
    config: string | undefined;
    report: boolean;
    failOnDanger: boolean;
    debug: boolean;
    help: boolean;
}

/**
 * @throws {DetectionError} `INVALID_CONFIG` for a non-numeric threshold
 * @internal exported for testing
 */
export function parseArgs(argv: readonly string[]): CliArgs {
    const args = argv.slice(2);
    const result: CliArgs = {
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
    };

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        switch (arg) {
            case '--json':
                result.json = true;
                break;
            case '--parallel':
                result.parallel = true;
                break;
            case '-t':
            case '--threshold':
                result.threshold = parseThreshold(args[++i]);
                break;
            case '--start-tag':
                result.startTag = args[++i];
                break;
            case '--end-tag':
                result.endTag = args[++i];
                break;
            case '-c':
            case '--config':
                result.config = args[++i];
                break;
            case '--report':
                result.report = true;
                break;
            case '--fail-on-danger':
                result.failOnDanger = true;
                break;
            case '--debug':
                result.debug = true;
                break;
            case '-h':
            case '--help':
                result.help = true;
                break;
            default:
                if (result.file === undefined) result.file = arg;
                break;
        }
    }

    return result;
}

function parseThreshold(value: string | undefined): number {
    const parsed = value === undefined || value.trim() === '' ? Number.NaN : Number(value);
    if (Number.isNaN(parsed)) {
        throw new DetectionError('INVALID_CONFIG', `--threshold expects a number, got "${value ?? ''}"`);
    }
    return parsed;
}

// ============================================================================
// Runner
// ============================================================================

/**
 * Process boundaries, injected so the runner can be driven in-process.
 * @internal exported for testing
 */
export interface CliIO {
    readonly cwd: string;
    readInput(file: string | undefined): Promise<string>;
    stdout(text: string): void;
    stderr(text: string): void;
}

/** @internal exported for testing */
export interface ReportSummary {
    readonly mode: 'text' | 'json';
    readonly confidence: number;
    readonly wrapped: boolean;
    readonly reverted: boolean;
    readonly dangerous: boolean;
    readonly dangerPatterns?: readonly string[] | undefined;
}

/** @internal exported for testing */
export function formatReport(summary: ReportSummary): string {
    const yesNo = (flag: boolean): string => (flag ? 'yes' : 'no');
    const lines = [
        `  mode        ${summary.mode}`,
        `  confidence  ${summary.confidence.toFixed(1)}`,
        `  wrapped     ${yesNo(summary.wrapped)}`,
        `  reverted    ${yesNo(summary.reverted)}`,
        `  dangerous   ${yesNo(summary.dangerous)}`,
    ];
    if (summary.dangerPatterns && summary.dangerPatterns.length > 0) {
        lines.push(`  patterns    ${summary.dangerPatterns.join(', ')}`);
    }
    return lines.join('\n');
}

/**
 * Run one CLI invocation and return its exit code. A
 * {@link DetectionError} is printed and mapped to exit code 1.
 * @internal exported for testing
 */
export async function run(args: CliArgs, io: CliIO): Promise<number> {
    if (args.help) {
        io.stdout(`${HELP}\n`);
        return EXIT_OK;
    }

    try {
        return await detectFromInput(args, io);
    } catch (err) {
        if (!(err instanceof DetectionError)) throw err;
        io.stderr(`Error [${err.code}]: ${err.message}\n`);
        return EXIT_ERROR;
    }
}

async function detectFromInput(args: CliArgs, io: CliIO): Promise<number> {
    const overrides: DetectorOptions = {
        threshold: args.threshold,
        startTag: args.startTag,
        endTag: args.endTag,
        parallel: args.parallel ? true : undefined,
    };
    const config = applyCliOverrides(loadConfig(args.config, io.cwd), overrides);

    const debug = args.debug
        ? createDebugObserver(event => io.stderr(`${formatDebugEvent(event)}\n`))
        : undefined;
    const detector = await CodeDetector.create(config, { debug });

    let input: string;
    try {
        input = await io.readInput(args.file);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        io.stderr(`Error: cannot read ${args.file ?? 'stdin'}: ${message}\n`);
        return EXIT_ERROR;
    }

    let summary: ReportSummary;
    if (args.json) {
        const report = await detector.scanJson(input);
        io.stdout(report.output);
        summary = { mode: 'json', ...report };
    } else {
        const report = detector.scanText(input);
        io.stdout(report.output);
        summary = { mode: 'text', ...report };
    }

    if (args.report) io.stderr(`${formatReport(summary)}\n`);

    return args.failOnDanger && summary.dangerous ? EXIT_DANGER : EXIT_OK;
}

// ============================================================================
// Entry Point
// ============================================================================

async function readStdin(): Promise<string> {
    process.stdin.setEncoding('utf-8');
    let data = '';
    for await (const chunk of process.stdin) data += String(chunk);
    return data;
}

const processIO: CliIO = {
    cwd: process.cwd(),
    readInput: file => (file === undefined || file === '-' ? readStdin() : readFile(file, 'utf-8')),
    stdout: text => { process.stdout.write(text); },
    stderr: text => { process.stderr.write(text); },
};

async function main(): Promise<void> {
    let args: CliArgs;
    try {
        args = parseArgs(process.argv);
    } catch (err) {
        if (!(err instanceof DetectionError)) throw err;
        console.error(`Error: ${err.message}\n\n${HELP}`);
        process.exitCode = EXIT_ERROR;
        return;
    }
    process.exitCode = await run(args, processIO);
}

/* c8 ignore next 8: CLI entry-point guard */
const isCLI = process.argv[1]?.endsWith('warden') || process.argv[1]?.endsWith('warden.js');
if (isCLI) {
    main().catch((err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(EXIT_ERROR);
    });
}
