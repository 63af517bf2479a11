/**
 * Context Gatherer - Full ingestion pipeline:
 *
 * 1. Validate the repository root
 * 2. Load ignore rules (.gitignore + built-in directories)
 * 3. Scan the tree, pruning excluded directories and skipping unreadable files
 * 4. Assemble the context blob
 *
 * Nothing here talks to a model; see ai/generator.ts for that half.
 */

import { existsSync, statSync } from 'fs';
import { resolve } from 'path';
import { ScanEmptyError, InvalidRootError } from '../errors.js';
import { buildIgnoreRules, type IgnoreRuleSet } from './ignore.js';
import { scanTree, type FileRecord, type SkippedEntry } from './scanner.js';
import { assembleContext } from './assemble.js';

export interface GatherOptions {
  /** Replace the rules loaded from the root (mostly for tests) */
  rules?: IgnoreRuleSet;
  /** Verbose logging */
  verbose?: boolean;
}

export interface GatherResult {
  /** The assembled context string */
  context: string;
  /** Files included, in scan order */
  files: FileRecord[];
  /** Number of files included */
  fileCount: number;
  /** Context size in characters (reported, never enforced) */
  totalChars: number;
  /** Files and directories left out and why */
  skipped: SkippedEntry[];
  /** Ignore rules that were applied */
  rules: IgnoreRuleSet;
  /** Timing info */
  timing: {
    scanMs: number;
    assembleMs: number;
    totalMs: number;
  };
}

/**
 * Validate that the root exists and is a directory. Returns the absolute path.
 */
export function validateRoot(root: string): string {
  const abs = resolve(root);

  if (!existsSync(abs)) {
    throw new InvalidRootError(`Path not found: ${abs}`, abs);
  }

  if (!statSync(abs).isDirectory()) {
    throw new InvalidRootError(`Path is not a directory: ${abs}`, abs);
  }

  return abs;
}

/**
 * validate → ignore rules → scan → assemble.
 * Throws ScanEmptyError when no file survives filtering.
 */
export function gatherContext(root: string, options: GatherOptions = {}): GatherResult {
  const totalStart = Date.now();
  const { verbose = false } = options;

  const absRoot = validateRoot(root);
  const rules = options.rules ?? buildIgnoreRules(absRoot);

  if (verbose) {
    console.log(`  Ignore rules (${rules.size}): ${[...rules].join(', ')}`);
  }

  // ── Scan ────────────────────────────────────────────────────────────────
  const scanStart = Date.now();
  const scan = scanTree(absRoot, { rules, verbose });
  const scanMs = Date.now() - scanStart;

  if (verbose) {
    const readErrors = scan.skipped.filter(s => s.reason === 'read-error').length;
    console.log(`  Read ${scan.files.length} files in ${scanMs}ms`);
    console.log(`  Skipped ${scan.skipped.length} entries (${readErrors} unreadable)`);
  }

  if (scan.files.length === 0) {
    throw new ScanEmptyError(
      `No files found to analyze in ${absRoot}. Check the path and your .gitignore patterns.`,
      absRoot,
    );
  }

  // ── Assemble ────────────────────────────────────────────────────────────
  const assembleStart = Date.now();
  const context = assembleContext(scan.files);
  const assembleMs = Date.now() - assembleStart;

  return {
    context,
    files: scan.files,
    fileCount: scan.files.length,
    totalChars: context.length,
    skipped: scan.skipped,
    rules,
    timing: { scanMs, assembleMs, totalMs: Date.now() - totalStart },
  };
}
