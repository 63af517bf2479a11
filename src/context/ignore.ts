/**
 * Ignore Rules - raw patterns from the repository's .gitignore plus the
 * directories that are never worth reading (dependency caches, VCS metadata, build output).
 *
 * Patterns are kept verbatim. Matching is done by the path filter, not here.
 */

import { readFileSync } from 'fs';
import { join } from 'path';

export type IgnoreRuleSet = ReadonlySet<string>;

export const IGNORE_FILE_NAME = '.gitignore';

/** Added to every rule set, whatever the ignore file says */
export const BUILTIN_IGNORE_DIRS: readonly string[] = [
    'node_modules',
    '.git',
    '__pycache__',
    '.venv',
    'venv',
    'dist',
    'build',
];

/**
 * Read patterns from `<root>/.gitignore`.
 * A missing or unreadable file yields an empty set.
 */
export function loadIgnoreRules(root: string): Set<string> {
    const patterns = new Set<string>();

    let content: string;
    try {
        content = readFileSync(join(root, IGNORE_FILE_NAME), 'utf-8');
    } catch {
        return patterns;
    }

    for (const line of content.split(/\r?\n/)) {
        const trimmed = line.trim();
        if (!trimmed || trimmed.startsWith('#')) continue;
        patterns.add(trimmed);
    }

    return patterns;
}

/** File patterns merged with the built-in directory names. */
export function buildIgnoreRules(root: string): IgnoreRuleSet {
    const rules = loadIgnoreRules(root);
    for (const dir of BUILTIN_IGNORE_DIRS) rules.add(dir);
    return rules;
}
