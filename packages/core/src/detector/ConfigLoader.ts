/**
 * ConfigLoader: YAML Configuration File Reader
 *
 * Loads `snippet-warden.yaml` from cwd or a specified path, validates
 * it against {@link DetectorConfigSchema} and fills defaults. CLI flags
 * override file values.
 *
 * @module
 */
import { readFileSync, existsSync } from 'node:fs';
import { resolve, join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { DetectionError } from './DetectionError.js';
import { resolveConfig, type DetectorConfig, type DetectorOptions } from './DetectorConfig.js';

// ── Filename Conventions ─────────────────────────────────

export const CONFIG_FILENAMES = [
    'snippet-warden.yaml',
    'snippet-warden.yml',
    'snippet-warden.json',
] as const;

// ── Public API ───────────────────────────────────────────

/**
 * Load configuration from a YAML/JSON file.
 *
 * Priority:
 *   1. Explicit `configPath` argument
 *   2. Auto-detect `snippet-warden.yaml` / `.yml` / `.json` in `cwd`
 *   3. Fall back to all defaults
 *
 * @param configPath - Explicit path to config file (optional)
 * @param cwd - Working directory for auto-detection (default: process.cwd())
 * @throws {DetectionError} `CONFIG_NOT_FOUND` or `INVALID_CONFIG`
 */
export function loadConfig(configPath?: string, cwd?: string): DetectorConfig {
    const workDir = cwd ?? process.cwd();

    if (configPath) {
        const absPath = resolve(workDir, configPath);
        if (!existsSync(absPath)) {
            throw new DetectionError('CONFIG_NOT_FOUND', `Config file not found: "${absPath}"`);
        }
        return parseConfigFile(absPath);
    }

    for (const filename of CONFIG_FILENAMES) {
        const candidate = join(workDir, filename);
        if (existsSync(candidate)) {
            return parseConfigFile(candidate);
        }
    }

    return resolveConfig({});
}

/**
 * Merge a loaded config with CLI overrides. Flags take precedence;
 * the result is validated again.
 */
export function applyCliOverrides(config: DetectorConfig, cli: DetectorOptions): DetectorConfig {
    const overrides = Object.fromEntries(
        Object.entries(cli).filter(([, value]) => value !== undefined),
    );
    return resolveConfig({ ...config, ...overrides });
}

// ── Internal ─────────────────────────────────────────────

function parseConfigFile(filePath: string): DetectorConfig {
    const content = readFileSync(filePath, 'utf-8');
    let raw: unknown;
    try {
        raw = filePath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new DetectionError('INVALID_CONFIG', `Cannot parse config file "${filePath}": ${message}`, { cause: err });
    }
    // An empty YAML file parses to null
    return resolveConfig(raw ?? {});
}
