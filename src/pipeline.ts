/**
 * Guide pipeline: resolve credential → gather context → generate → write.
 *
 * The output file is written only after generation succeeded; any failure
 * leaves nothing behind.
 */

import { writeFileSync } from 'fs';
import { resolve } from 'path';
import { gatherContext, validateRoot, type GatherResult } from './context/index.js';
import { resolveCredential } from './ai/credentials.js';
import { generateDocumentation, type GenerateFn, type GenerationResult } from './ai/generator.js';

export interface RunOptions {
    /** Repository root to scan */
    path: string;
    /** Destination file, or '-' for stdout */
    output: string;
    /** Force a single model */
    model?: string;
    timeoutMs?: number;
    verbose?: boolean;
    /** Stop after gathering: no credential, no model call, no output file */
    onlyContext?: boolean;
    /** Environment to read the API key from (default: process.env) */
    env?: NodeJS.ProcessEnv;
    /** Where the .env search starts (default: the resolver's own directory) */
    credentialStartDir?: string;
    /** Replace the Gemini call */
    generate?: GenerateFn;
}

export interface RunResult {
    gather: GatherResult;
    generation?: GenerationResult;
    /** Absolute path written, undefined for stdout or onlyContext */
    outputPath?: string;
}

export async function runGuide(options: RunOptions): Promise<RunResult> {
    const root = validateRoot(options.path);
    const verbose = options.verbose ?? false;

    let apiKey: string | undefined;
    if (!options.onlyContext) {
        const credential = resolveCredential({
            env: options.env,
            startDir: options.credentialStartDir,
        });
        apiKey = credential.apiKey;
        if (verbose) console.log(`🔑 API key source: ${credential.source}`);
    }

    console.log(`📂 Scanning codebase: ${root}`);
    const gather = gatherContext(root, { verbose });
    console.log(`📄 Found ${gather.fileCount} files to analyze.`);
    console.log(`📊 Total context size: ${gather.totalChars.toLocaleString('en-US')} characters`);

    if (options.onlyContext) {
        return { gather };
    }

    console.log('⏳ Generating documentation...');
    const generation = await generateDocumentation(gather.context, {
        model: options.model,
        generate: options.generate,
        apiKey,
        timeoutMs: options.timeoutMs,
        verbose,
    });

    if (options.output === '-') {
        process.stdout.write(generation.text + '\n');
        return { gather, generation };
    }

    const outputPath = resolve(options.output);
    writeFileSync(outputPath, generation.text, 'utf-8');
    return { gather, generation, outputPath };
}
