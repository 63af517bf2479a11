import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { resolveCredential, parseEnvFile, findInEnvFiles } from '../../../src/ai/credentials.js';
import { ConfigurationError } from '../../../src/errors.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

let seq = 0;

function nestedDir(root: string, depth: number): string {
    let dir = root;
    for (let i = 1; i <= depth; i++) dir = join(dir, `level${i}`);
    mkdirSync(dir, { recursive: true });
    return dir;
}

// ── parseEnvFile ────────────────────────────────────────────────────────────

describe('parseEnvFile', () => {
    it('reads an unquoted value', () => {
        expect(parseEnvFile('GEMINI_API_KEY=test-key')).toBe('test-key');
    });

    it('allows spaces around the equals sign', () => {
        expect(parseEnvFile('GEMINI_API_KEY = test-key')).toBe('test-key');
    });

    it('strips double or single quotes', () => {
        expect(parseEnvFile('GEMINI_API_KEY="test-key"')).toBe('test-key');
        expect(parseEnvFile("GEMINI_API_KEY='test-key'")).toBe('test-key');
    });

    it('accepts an export prefix', () => {
        expect(parseEnvFile('export GEMINI_API_KEY=test-key')).toBe('test-key');
    });

    it('skips comments and other variables', () => {
        const content = '# GEMINI_API_KEY=commented\nOTHER_KEY=nope\nGEMINI_API_KEY_OLD=old\nGEMINI_API_KEY=real\n';
        expect(parseEnvFile(content)).toBe('real');
    });

    it('returns the first non-empty assignment', () => {
        expect(parseEnvFile('GEMINI_API_KEY=\nGEMINI_API_KEY=first\nGEMINI_API_KEY=second')).toBe('first');
    });

    it('returns undefined when the variable is absent', () => {
        expect(parseEnvFile('OTHER=1\n')).toBeUndefined();
    });

    it('handles CRLF line endings', () => {
        expect(parseEnvFile('A=1\r\nGEMINI_API_KEY=test-key\r\n')).toBe('test-key');
    });
});

// ── resolveCredential ───────────────────────────────────────────────────────

describe('resolveCredential', () => {
    let fixture: string;

    beforeEach(() => {
        fixture = join(tmpdir(), `guidegen-cred-test-${Date.now()}-${seq++}`);
        mkdirSync(fixture, { recursive: true });
    });

    afterEach(() => {
        rmSync(fixture, { recursive: true, force: true });
    });

    it('prefers the environment', () => {
        writeFileSync(join(fixture, '.env'), 'GEMINI_API_KEY=file-key');

        const result = resolveCredential({ env: { GEMINI_API_KEY: 'env-key' }, startDir: fixture });

        expect(result).toEqual({ apiKey: 'env-key', source: 'env' });
    });

    it('ignores a blank environment value', () => {
        writeFileSync(join(fixture, '.env'), 'GEMINI_API_KEY=file-key');

        const result = resolveCredential({ env: { GEMINI_API_KEY: '   ' }, startDir: fixture });

        expect(result).toEqual({ apiKey: 'file-key', source: join(fixture, '.env') });
    });

    it('finds the key in an ancestor directory', () => {
        writeFileSync(join(fixture, '.env'), 'GEMINI_API_KEY = "ancestor-key"');
        const start = nestedDir(fixture, 3);

        const result = resolveCredential({ env: {}, startDir: start });

        expect(result.apiKey).toBe('ancestor-key');
        expect(result.source).toBe(join(fixture, '.env'));
    });

    it('stops at the nearest file that has the key', () => {
        writeFileSync(join(fixture, '.env'), 'GEMINI_API_KEY=outer-key');
        const start = nestedDir(fixture, 1);
        writeFileSync(join(start, '.env'), 'GEMINI_API_KEY=inner-key');

        expect(resolveCredential({ env: {}, startDir: start }).apiKey).toBe('inner-key');
    });

    it('keeps climbing past a file without the key', () => {
        writeFileSync(join(fixture, '.env'), 'GEMINI_API_KEY=outer-key');
        const start = nestedDir(fixture, 1);
        writeFileSync(join(start, '.env'), 'OTHER=1');

        expect(resolveCredential({ env: {}, startDir: start }).apiKey).toBe('outer-key');
    });

    it('searches six directories at most', () => {
        writeFileSync(join(fixture, '.env'), 'GEMINI_API_KEY=too-far');

        expect(findInEnvFiles(nestedDir(fixture, 5))?.apiKey).toBe('too-far');
        expect(findInEnvFiles(nestedDir(fixture, 6))).toBeUndefined();
    });

    it('throws ConfigurationError when no source has the key', () => {
        const start = nestedDir(fixture, 6);

        expect(() => resolveCredential({ env: {}, startDir: start })).toThrow(ConfigurationError);
        expect(() => resolveCredential({ env: {}, startDir: start })).toThrow('GEMINI_API_KEY environment variable not set');
    });

    it('does not write the key into process.env', () => {
        const before = process.env.GEMINI_API_KEY;
        writeFileSync(join(fixture, '.env'), 'GEMINI_API_KEY=file-key');

        resolveCredential({ env: {}, startDir: fixture });

        expect(process.env.GEMINI_API_KEY).toBe(before);
    });
});
