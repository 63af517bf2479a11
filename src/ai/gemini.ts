/**
 * Gemini API Client
 *
 * callGemini() → one generateContent request, raw text out.
 * Empty output is returned as '' so the caller can decide whether to fall back.
 */

import { GEMINI_API_BASE_URL, DEFAULT_TEMPERATURE, DEFAULT_TIMEOUT_MS } from './constants.js';

export interface GenerationRequest {
    model: string;
    systemInstruction: string;
    userContent: string;
    temperature?: number;
}

export interface CallGeminiOptions {
    apiKey: string;
    /** Request timeout in milliseconds (default: 300000 = 5 min) */
    timeoutMs?: number;
    /** Override the API base URL */
    baseUrl?: string;
    verbose?: boolean;
}

interface GenerateContentResponse {
    candidates?: Array<{
        content?: { parts?: Array<{ text?: string }> };
        finishReason?: string;
    }>;
}

export function generateContentUrl(model: string, baseUrl: string = GEMINI_API_BASE_URL): string {
    return `${baseUrl}/models/${encodeURIComponent(model)}:generateContent`;
}

/** Concatenated text parts of the first candidate. */
export function extractText(data: GenerateContentResponse): string {
    const parts = data.candidates?.[0]?.content?.parts ?? [];
    return parts.map(p => p.text ?? '').join('');
}

/**
 * Send a single generation request. Throws on transport or HTTP errors.
 */
export async function callGemini(
    request: GenerationRequest,
    options: CallGeminiOptions
): Promise<string> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const temperature = request.temperature ?? DEFAULT_TEMPERATURE;

    if (options.verbose) {
        console.log(`  Calling ${request.model}...`);
        console.log(`  Temperature: ${temperature}`);
        console.log(`  Prompt size: ${(request.userContent.length / 1024).toFixed(1)}KB`);
        console.log(`  Timeout: ${timeoutMs / 1000}s`);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    // The timer covers the body read as well as the request itself.
    try {
        const response = await fetch(generateContentUrl(request.model, options.baseUrl), {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                'x-goog-api-key': options.apiKey,
            },
            body: JSON.stringify({
                systemInstruction: { parts: [{ text: request.systemInstruction }] },
                contents: [{ role: 'user', parts: [{ text: request.userContent }] }],
                generationConfig: { temperature },
            }),
            signal: controller.signal,
        });

        if (!response.ok) {
            const error = await response.text();
            throw new Error(`Gemini API error (${response.status}): ${error}`);
        }

        if (options.verbose) console.log(`  Response received`);

        const data = (await response.json()) as GenerateContentResponse;
        return extractText(data);
    } catch (err) {
        if (err instanceof Error && err.name === 'AbortError') {
            throw new Error(`Gemini request timed out after ${timeoutMs / 1000}s (model: ${request.model})`);
        }
        throw err;
    } finally {
        clearTimeout(timer);
    }
}
