/**
 * Tree Scanner - walks a repository and reads every file the path filter keeps.
 *
 * Excluded directories are pruned before descent, so nothing beneath them is visited.
 * Per-file failures (permissions, invalid UTF-8) are recorded and skipped, never thrown.
 */

import { readdirSync, readFileSync, statSync, type Dirent } from 'fs';
import { join } from 'path';
import { excludeReason, toRelativePath, type ExcludeReason } from './filter.js';
import type { IgnoreRuleSet } from './ignore.js';

export interface FileRecord {
    /** Path relative to the scan root, forward slashes */
    readonly path: string;
    /** Full decoded text */
    readonly content: string;
}

export interface SkippedEntry {
    path: string;
    reason: ExcludeReason | 'read-error';
}

export interface ScanResult {
    /** Files in discovery order */
    files: FileRecord[];
    skipped: SkippedEntry[];
}

export interface ScanOptions {
    rules: IgnoreRuleSet;
    verbose?: boolean;
}

interface WalkContext {
    root: string;
    rules: IgnoreRuleSet;
    verbose: boolean;
    files: FileRecord[];
    skipped: SkippedEntry[];
}

/**
 * Scan `root` depth-first. Within a directory entries are taken in name order,
 * files before subdirectories.
 */
export function scanTree(root: string, options: ScanOptions): ScanResult {
    const ctx: WalkContext = {
        root,
        rules: options.rules,
        verbose: options.verbose ?? false,
        files: [],
        skipped: [],
    };

    walkDir(root, ctx);

    return { files: ctx.files, skipped: ctx.skipped };
}

/**
 * Decode bytes as strict UTF-8. Throws on malformed input rather than
 * substituting replacement characters.
 */
export function decodeText(bytes: Uint8Array): string {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
}

function byName(a: Dirent, b: Dirent): number {
    if (a.name < b.name) return -1;
    if (a.name > b.name) return 1;
    return 0;
}

type EntryKind = 'file' | 'directory' | 'other';

function entryKind(entry: Dirent, fullPath: string): EntryKind {
    if (entry.isDirectory()) return 'directory';
    if (entry.isFile()) return 'file';
    if (!entry.isSymbolicLink()) return 'other';

    // Links are read when they point at files, never followed into directories
    try {
        return statSync(fullPath).isDirectory() ? 'other' : 'file';
    } catch {
        return 'file';
    }
}

function walkDir(currentPath: string, ctx: WalkContext): void {
    let entries: Dirent[];
    try {
        entries = readdirSync(currentPath, { withFileTypes: true });
    } catch (error) {
        if (ctx.verbose) console.log(`  Cannot list ${currentPath}: ${error}`);
        return;
    }

    entries.sort(byName);

    const dirs: string[] = [];

    for (const entry of entries) {
        const fullPath = join(currentPath, entry.name);
        const kind = entryKind(entry, fullPath);

        if (kind === 'directory') {
            dirs.push(fullPath);
            continue;
        }
        if (kind === 'other') continue;

        const relPath = toRelativePath(ctx.root, fullPath);
        const reason = excludeReason(fullPath, { root: ctx.root, rules: ctx.rules });
        if (reason) {
            ctx.skipped.push({ path: relPath, reason });
            continue;
        }

        try {
            ctx.files.push({ path: relPath, content: decodeText(readFileSync(fullPath)) });
        } catch (error) {
            if (ctx.verbose) console.log(`  Skipped ${relPath}: ${error}`);
            ctx.skipped.push({ path: relPath, reason: 'read-error' });
        }
    }

    for (const dirPath of dirs) {
        const reason = excludeReason(dirPath, { root: ctx.root, rules: ctx.rules, isDirectory: true });
        if (reason) {
            ctx.skipped.push({ path: toRelativePath(ctx.root, dirPath), reason });
            continue;
        }
        walkDir(dirPath, ctx);
    }
}
