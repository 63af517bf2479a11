/**
 * Context Assembler - joins scanned files into the single text blob sent to the model.
 */

import type { FileRecord } from './scanner.js';

const DELIMITER_LINE = /^--- FILE: (.*) ---$/gm;

export function fileDelimiter(path: string): string {
    return `--- FILE: ${path} ---`;
}

/**
 * One block per file, in scan order: delimiter line, content, blank separator line.
 * No truncation or deduplication.
 */
export function assembleContext(files: readonly FileRecord[]): string {
    const sections: string[] = [];

    for (const file of files) {
        sections.push(`${fileDelimiter(file.path)}\n${file.content}\n`);
    }

    return sections.join('\n');
}

/**
 * Inverse of assembleContext. Content that itself contains a delimiter line
 * cannot be told apart from a file boundary.
 */
export function splitContext(context: string): FileRecord[] {
    const headers = [...context.matchAll(DELIMITER_LINE)];

    return headers.map((match, i) => {
        const start = (match.index ?? 0) + match[0].length + 1;
        const next = headers[i + 1];
        // each block ends with "\n", and blocks are joined by one more
        const end = next ? (next.index ?? context.length) - 2 : context.length - 1;
        return { path: match[1], content: context.slice(start, end) };
    });
}
