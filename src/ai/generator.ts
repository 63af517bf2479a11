/**
 * Generation Orchestrator
 *
 * Tries each candidate model once, in order, and stops at the first non-empty answer.
 * An explicit model replaces the default list entirely.
 *
 * The model call is injectable: pass your own GenerateFn or a mock for tests.
 */

import { ConfigurationError, GenerationError } from '../errors.js';
import { DEFAULT_MODELS, DEFAULT_TEMPERATURE } from './constants.js';
import { callGemini, type GenerationRequest } from './gemini.js';
import { GUIDE_SYSTEM_PROMPT, buildUserPrompt } from './prompts.js';

export type GenerateFn = (request: GenerationRequest) => Promise<string>;

export type AttemptOutcome =
    | { status: 'success'; text: string }
    | { status: 'empty' }
    | { status: 'failure'; error: unknown };

export interface GenerationAttempt {
    model: string;
    outcome: AttemptOutcome;
}

export interface GenerateOptions {
    /** Force a single model instead of the default fallback list */
    model?: string;
    /** Model call; defaults to callGemini with apiKey */
    generate?: GenerateFn;
    apiKey?: string;
    timeoutMs?: number;
    verbose?: boolean;
}

export interface GenerationResult {
    text: string;
    /** Model that produced the text */
    model: string;
    attempts: GenerationAttempt[];
}

export function candidateModels(model?: string): string[] {
    return model ? [model] : [...DEFAULT_MODELS];
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function resolveGenerateFn(options: GenerateOptions): GenerateFn {
    if (options.generate) return options.generate;

    const { apiKey, timeoutMs, verbose } = options;
    if (!apiKey) {
        throw new ConfigurationError('An API key is required to call the generation backend.');
    }
    return (request) => callGemini(request, { apiKey, timeoutMs, verbose });
}

/**
 * Generate the guide from an assembled context.
 * Throws GenerationError once every candidate has failed or returned nothing.
 */
export async function generateDocumentation(
    context: string,
    options: GenerateOptions = {}
): Promise<GenerationResult> {
    const generate = resolveGenerateFn(options);
    const userContent = buildUserPrompt(context);
    const models = candidateModels(options.model);

    const attempts: GenerationAttempt[] = [];
    let lastError: unknown;

    for (const model of models) {
        console.log(`🤖 Attempting generation with model: ${model}...`);

        let raw: string;
        try {
            raw = await generate({
                model,
                systemInstruction: GUIDE_SYSTEM_PROMPT,
                userContent,
                temperature: DEFAULT_TEMPERATURE,
            });
        } catch (error) {
            console.warn(`❌ Model ${model} failed: ${describeError(error)}`);
            attempts.push({ model, outcome: { status: 'failure', error } });
            lastError = error;
            continue;
        }

        const text = raw.trim();
        if (text) {
            attempts.push({ model, outcome: { status: 'success', text } });
            return { text, model, attempts };
        }

        console.warn(`⚠️  Model ${model} returned no text.`);
        attempts.push({ model, outcome: { status: 'empty' } });
    }

    let message = `Documentation generation failed with all attempted models (${models.join(', ')}).`;
    if (lastError !== undefined) {
        message += `\nLast error: ${describeError(lastError)}`;
    }
    throw new GenerationError(message, attempts, { cause: lastError });
}
