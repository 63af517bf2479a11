/**
 * Credential Resolver
 *
 * Finds the Gemini API key in the environment, or else in a `.env` file in this
 * module's own directory or one of its ancestors. The key is returned to the
 * caller and never written back into process.env.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../errors.js';
import { API_KEY_ENV, ENV_FILE_NAME, ENV_SEARCH_LEVELS } from './constants.js';

export interface CredentialOptions {
    /** Environment to check first (default: process.env) */
    env?: NodeJS.ProcessEnv;
    /** Directory where the `.env` search starts (default: this module's directory) */
    startDir?: string;
    /** Variable name (default: GEMINI_API_KEY) */
    name?: string;
    /** How many directories to try, start directory included (default: 6) */
    maxLevels?: number;
}

export interface ResolvedCredential {
    apiKey: string;
    /** 'env' or the path of the file the key came from */
    source: string;
}

/** Where the `.env` search starts unless told otherwise: next to the installed resolver */
export const RESOLVER_DIR = dirname(fileURLToPath(import.meta.url));

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function unquoteEnvValue(value: string): string {
    const trimmed = value.trim();
    if (
        trimmed.length >= 2 &&
        ((trimmed.startsWith('"') && trimmed.endsWith('"')) ||
            (trimmed.startsWith("'") && trimmed.endsWith("'")))
    ) {
        return trimmed.slice(1, -1);
    }
    return trimmed;
}

/**
 * Value of `name` in env-file content, or undefined.
 * The first line that assigns a non-empty value wins.
 */
export function parseEnvFile(content: string, name: string = API_KEY_ENV): string | undefined {
    const assignment = new RegExp(`^${escapeRegExp(name)}\\s*=\\s*(.*)$`);

    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith('#')) continue;

        const normalized = trimmed.startsWith('export ') ? trimmed.slice(7).trim() : trimmed;
        const match = assignment.exec(normalized);
        if (!match) continue;

        const value = unquoteEnvValue(match[1]);
        if (value) return value;
    }

    return undefined;
}

/**
 * Walk from startDir upwards looking for a `.env` file that sets `name`.
 */
export function findInEnvFiles(
    startDir: string,
    name: string = API_KEY_ENV,
    maxLevels: number = ENV_SEARCH_LEVELS,
): ResolvedCredential | undefined {
    let current = startDir;

    for (let level = 0; level < maxLevels; level++) {
        const envPath = join(current, ENV_FILE_NAME);
        let content: string | undefined;
        try {
            content = readFileSync(envPath, 'utf-8');
        } catch {
            content = undefined; // missing or unreadable: keep climbing
        }

        if (content !== undefined) {
            const value = parseEnvFile(content, name);
            if (value) return { apiKey: value, source: envPath };
        }

        const parent = dirname(current);
        if (parent === current) break;
        current = parent;
    }

    return undefined;
}

/**
 * Environment first, then `.env` files. Throws ConfigurationError when neither has it.
 */
export function resolveCredential(options: CredentialOptions = {}): ResolvedCredential {
    const name = options.name ?? API_KEY_ENV;
    const env = options.env ?? process.env;
    const startDir = options.startDir ?? RESOLVER_DIR;

    const fromEnv = env[name]?.trim();
    if (fromEnv) return { apiKey: fromEnv, source: 'env' };

    const fromFile = findInEnvFiles(startDir, name, options.maxLevels);
    if (fromFile) return fromFile;

    throw new ConfigurationError(
        `${name} environment variable not set.\n` +
        `Export ${name} or add "${name}=<your key>" to a ${ENV_FILE_NAME} file in ${startDir} or a parent.`
    );
}
