/**
 * CLI Config File Support
 *
 * One JSON file for the options you would otherwise repeat on every run:
 * - Scan root (path)
 * - Output file (output)
 * - Model override (model)
 * - Request timeout (timeoutSecs)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 * The API key is deliberately not a config field; it comes from GEMINI_API_KEY or .env.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { DEFAULT_OUTPUT, DEFAULT_TIMEOUT_MS } from './constants.js';

export interface CliConfig {
    path?: string;
    output?: string;
    model?: string;
    /** Generation request timeout in seconds (default: 300) */
    timeoutSecs?: number;
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>(['path', 'output', 'model', 'timeoutSecs', 'verbose']);

function assertString(obj: Record<string, unknown>, key: string): string {
    const value = obj[key];
    if (typeof value !== 'string') throw new Error(`Config "${key}" must be a string`);
    return value;
}

function assertNumber(obj: Record<string, unknown>, key: string): number {
    const value = obj[key];
    if (typeof value !== 'number') throw new Error(`Config "${key}" must be a number`);
    return value;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const value = obj[key];
    if (typeof value !== 'boolean') throw new Error(`Config "${key}" must be a boolean`);
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Load and validate a CLI config file.
 *
 * - Resolves configPath relative to CWD
 * - A relative "path" resolves from the config file's directory
 * - Throws on missing file or invalid JSON
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new Error(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch {
        throw new Error(`Failed to read config file: ${absolutePath}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch {
        throw new Error(`Invalid JSON in config file: ${absolutePath}`);
    }

    if (!isRecord(parsed)) {
        throw new Error(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const unknownKeys = Object.keys(parsed).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const configDir = dirname(absolutePath);

    if (parsed.path !== undefined) {
        const p = assertString(parsed, 'path');
        config.path = isAbsolute(p) ? p : resolve(configDir, p);
    }
    if (parsed.output !== undefined) config.output = assertString(parsed, 'output');
    if (parsed.model !== undefined) config.model = assertString(parsed, 'model');
    if (parsed.timeoutSecs !== undefined) {
        const secs = assertNumber(parsed, 'timeoutSecs');
        if (!(secs > 0)) throw new Error('Config "timeoutSecs" must be greater than 0');
        config.timeoutSecs = secs;
    }
    if (parsed.verbose !== undefined) config.verbose = assertBoolean(parsed, 'verbose');

    return config;
}

// ── Default template ────────────────────────────────────────────────────────

/**
 * Default config template for `init` command.
 * Model is left out so the default fallback list applies.
 */
export const CONFIG_TEMPLATE: CliConfig = {
    path: '.',
    output: DEFAULT_OUTPUT,
    timeoutSecs: DEFAULT_TIMEOUT_MS / 1000,
    verbose: false,
};
