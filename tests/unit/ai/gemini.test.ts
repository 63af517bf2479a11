import { describe, it, expect, afterEach, vi } from 'vitest';
import { callGemini, extractText, generateContentUrl, type GenerationRequest } from '../../../src/ai/gemini.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

function mockFetchOk(data: unknown) {
    const fetchMock = vi.fn().mockResolvedValue({
        ok: true,
        json: async () => data,
    });
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

function mockFetchText(text: string) {
    return mockFetchOk({ candidates: [{ content: { parts: [{ text }] } }] });
}

function mockFetchError(status: number, body: string) {
    const fetchMock = vi.fn().mockResolvedValue({
        ok: false,
        status,
        text: async () => body,
    });
    vi.stubGlobal('fetch', fetchMock);
    return fetchMock;
}

const REQUEST: GenerationRequest = {
    model: 'gemini-test',
    systemInstruction: 'You are a code expert.',
    userContent: 'analyze this tree',
    temperature: 0.4,
};

// ── Tests ───────────────────────────────────────────────────────────────────

describe('callGemini', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
        vi.restoreAllMocks();
    });

    // ── Request structure ───────────────────────────────────────────────────

    it('posts to the model generateContent endpoint', async () => {
        const fetchMock = mockFetchText('hi');

        await callGemini(REQUEST, { apiKey: 'test-key' });

        expect(fetchMock).toHaveBeenCalledTimes(1);
        expect(fetchMock.mock.calls[0][0]).toBe(
            'https://generativelanguage.googleapis.com/v1beta/models/gemini-test:generateContent'
        );
        expect(fetchMock.mock.calls[0][1].method).toBe('POST');
    });

    it('sends the API key header', async () => {
        const fetchMock = mockFetchText('hi');

        await callGemini(REQUEST, { apiKey: 'test-key' });

        const headers = fetchMock.mock.calls[0][1].headers;
        expect(headers['x-goog-api-key']).toBe('test-key');
        expect(headers['Content-Type']).toBe('application/json');
    });

    it('sends system instruction, user turn and temperature', async () => {
        const fetchMock = mockFetchText('hi');

        await callGemini(REQUEST, { apiKey: 'test-key' });

        const body = JSON.parse(fetchMock.mock.calls[0][1].body);
        expect(body).toEqual({
            systemInstruction: { parts: [{ text: 'You are a code expert.' }] },
            contents: [{ role: 'user', parts: [{ text: 'analyze this tree' }] }],
            generationConfig: { temperature: 0.4 },
        });
    });

    it('defaults temperature to 0.4', async () => {
        const fetchMock = mockFetchText('hi');

        await callGemini({ ...REQUEST, temperature: undefined }, { apiKey: 'test-key' });

        const body = JSON.parse(fetchMock.mock.calls[0][1].body);
        expect(body.generationConfig.temperature).toBe(0.4);
    });

    it('honours a custom base URL', async () => {
        const fetchMock = mockFetchText('hi');

        await callGemini(REQUEST, { apiKey: 'test-key', baseUrl: 'http://localhost:9999/v1' });

        expect(fetchMock.mock.calls[0][0]).toBe('http://localhost:9999/v1/models/gemini-test:generateContent');
    });

    // ── Response handling ───────────────────────────────────────────────────

    it('returns the response text untouched', async () => {
        mockFetchText('  # Guide\n');

        await expect(callGemini(REQUEST, { apiKey: 'test-key' })).resolves.toBe('  # Guide\n');
    });

    it('joins multiple text parts', async () => {
        mockFetchOk({ candidates: [{ content: { parts: [{ text: '# A' }, { text: '\nB' }] } }] });

        await expect(callGemini(REQUEST, { apiKey: 'test-key' })).resolves.toBe('# A\nB');
    });

    it('returns an empty string when there are no candidates', async () => {
        mockFetchOk({ candidates: [] });

        await expect(callGemini(REQUEST, { apiKey: 'test-key' })).resolves.toBe('');
    });

    it('throws on API error response', async () => {
        mockFetchError(403, 'PERMISSION_DENIED');

        await expect(callGemini(REQUEST, { apiKey: 'test-key' })).rejects.toThrow(
            'Gemini API error (403): PERMISSION_DENIED'
        );
    });

    it('reports a timeout when the request is aborted', async () => {
        const abort = new Error('This operation was aborted');
        abort.name = 'AbortError';
        vi.stubGlobal('fetch', vi.fn().mockRejectedValue(abort));

        await expect(callGemini(REQUEST, { apiKey: 'test-key', timeoutMs: 5000 })).rejects.toThrow(
            'Gemini request timed out after 5s (model: gemini-test)'
        );
    });

    it('times out while reading a slow response body', async () => {
        const json = vi.fn();
        vi.stubGlobal('fetch', vi.fn(async (_url: string, init: RequestInit) => ({
            ok: true,
            json: json.mockImplementation(() => new Promise((_resolve, reject) => {
                init.signal?.addEventListener('abort', () => {
                    const abort = new Error('This operation was aborted');
                    abort.name = 'AbortError';
                    reject(abort);
                });
            })),
        })));

        await expect(callGemini(REQUEST, { apiKey: 'test-key', timeoutMs: 20 })).rejects.toThrow(
            'Gemini request timed out after 0.02s (model: gemini-test)'
        );
        expect(json).toHaveBeenCalledTimes(1);
    });

    it('rethrows other transport errors', async () => {
        vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('ECONNRESET')));

        await expect(callGemini(REQUEST, { apiKey: 'test-key' })).rejects.toThrow('ECONNRESET');
    });

    // ── Verbose logging ─────────────────────────────────────────────────────

    it('logs when verbose=true without printing the key', async () => {
        mockFetchText('hi');
        const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

        await callGemini(REQUEST, { apiKey: 'test-key', verbose: true });

        const logs = spy.mock.calls.map(c => String(c[0]));
        expect(logs).toContain('  Calling gemini-test...');
        expect(logs).toContain('  Temperature: 0.4');
        expect(logs).toContain('  Response received');
        expect(logs.some(l => l.includes('test-key'))).toBe(false);
    });

    it('does not log when verbose is false', async () => {
        mockFetchText('hi');
        const spy = vi.spyOn(console, 'log').mockImplementation(() => {});

        await callGemini(REQUEST, { apiKey: 'test-key' });

        expect(spy).not.toHaveBeenCalled();
    });
});

describe('helpers', () => {
    it('encodes the model name in the URL', () => {
        expect(generateContentUrl('models with space', 'https://api.test')).toBe(
            'https://api.test/models/models%20with%20space:generateContent'
        );
    });

    it('treats missing parts as empty text', () => {
        expect(extractText({ candidates: [{ content: { parts: [{}, { text: 'x' }] } }] })).toBe('x');
        expect(extractText({})).toBe('');
    });
});
