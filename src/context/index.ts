export { validateRoot, gatherContext } from './gather.js';
export type { GatherOptions, GatherResult } from './gather.js';

// Ignore rules
export { loadIgnoreRules, buildIgnoreRules, BUILTIN_IGNORE_DIRS, IGNORE_FILE_NAME } from './ignore.js';
export type { IgnoreRuleSet } from './ignore.js';

// Filtering
export {
  shouldExclude,
  excludeReason,
  matchesIgnorePattern,
  isSensitiveFileName,
  isTextFileName,
  toRelativePath,
  SENSITIVE_FILE_NAMES,
  SENSITIVE_FILE_SUFFIXES,
  TEXT_EXTENSIONS,
  EXTENSIONLESS_TEXT_NAMES,
} from './filter.js';
export type { ExcludeReason, FilterOptions } from './filter.js';

// Scanning
export { scanTree, decodeText } from './scanner.js';
export type { FileRecord, ScanResult, ScanOptions, SkippedEntry } from './scanner.js';

// Assembly
export { assembleContext, splitContext, fileDelimiter } from './assemble.js';
