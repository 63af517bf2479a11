/**
 * Path Filter - decides whether a file or directory stays out of the corpus.
 *
 * Three rule classes, checked in order (first match wins):
 * 1. Sensitive names: secret/credential files, never overridable
 * 2. Ignore patterns: coarse substring / name / prefix match against the relative path
 * 3. Files only: extension (or bare name) must be a recognised text format
 *
 * Pattern matching is intentionally not glob-aware. A pattern "log" excludes every
 * path containing "log"; "*.tmp" matches nothing unless that literal text appears.
 */

import { basename, extname, relative } from 'path';
import type { IgnoreRuleSet } from './ignore.js';

export type ExcludeReason = 'sensitive' | 'ignored' | 'unsupported';

export interface FilterOptions {
    /** Repository root the path is measured from */
    root: string;
    rules: IgnoreRuleSet;
    /** Directories skip the extension check */
    isDirectory?: boolean;
}

/** Exact file names that always hold secrets */
export const SENSITIVE_FILE_NAMES: ReadonlySet<string> = new Set([
    '.env',
    '.env.local',
    '.env.production',
    '.env.development',
]);

/** Key/certificate naming conventions, matched as file name suffixes (never directories) */
export const SENSITIVE_FILE_SUFFIXES: readonly string[] = [
    '.key',
    '.pem',
    '.secret',
    '_key.txt',
];

export const TEXT_EXTENSIONS: ReadonlySet<string> = new Set([
    '.py', '.js', '.ts', '.jsx', '.tsx', '.go', '.rs', '.java', '.kt', '.scala',
    '.c', '.cpp', '.h', '.hpp', '.cs', '.swift', '.rb', '.php', '.pl', '.lua',
    '.sh', '.bash', '.zsh', '.ps1', '.bat', '.cmd',
    '.html', '.htm', '.css', '.scss', '.sass', '.less',
    '.json', '.yaml', '.yml', '.toml', '.ini', '.cfg', '.conf',
    '.xml', '.xsl', '.xslt',
    '.md', '.markdown', '.rst', '.txt', '.adoc',
    '.sql', '.graphql', '.gql',
    '.dockerfile', '.makefile', '.cmake',
]);

/** Recognised text files without an extension (compared lower-cased) */
export const EXTENSIONLESS_TEXT_NAMES: ReadonlySet<string> = new Set(['dockerfile', 'makefile']);

/** Root-relative path with forward slashes, whatever the platform. */
export function toRelativePath(root: string, path: string): string {
    return relative(root, path).replace(/\\/g, '/');
}

export function isSensitiveFileName(name: string, isDirectory: boolean = false): boolean {
    if (SENSITIVE_FILE_NAMES.has(name)) return true;
    return !isDirectory && SENSITIVE_FILE_SUFFIXES.some(suffix => name.endsWith(suffix));
}

export function isTextFileName(name: string): boolean {
    if (TEXT_EXTENSIONS.has(extname(name).toLowerCase())) return true;
    return EXTENSIONLESS_TEXT_NAMES.has(name.toLowerCase());
}

/**
 * Check a relative path against raw ignore patterns.
 * Leading/trailing slashes are stripped from each pattern before matching.
 */
export function matchesIgnorePattern(relativePath: string, rules: IgnoreRuleSet): boolean {
    const name = relativePath.slice(relativePath.lastIndexOf('/') + 1);

    for (const pattern of rules) {
        const clean = pattern.replace(/^\/+|\/+$/g, '');
        if (relativePath.includes(clean) || name === clean) return true;
        // never true once slashes are stripped
        if (clean.endsWith('/') && relativePath.startsWith(clean)) return true;
    }

    return false;
}

/**
 * Which rule excludes `path`, or undefined when it is kept.
 */
export function excludeReason(path: string, options: FilterOptions): ExcludeReason | undefined {
    const name = basename(path);

    if (isSensitiveFileName(name, options.isDirectory)) return 'sensitive';

    if (matchesIgnorePattern(toRelativePath(options.root, path), options.rules)) return 'ignored';

    if (!options.isDirectory && !isTextFileName(name)) return 'unsupported';

    return undefined;
}

export function shouldExclude(path: string, options: FilterOptions): boolean {
    return excludeReason(path, options) !== undefined;
}
