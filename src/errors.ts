/**
 * Error types surfaced by the guide pipeline.
 *
 * Library code throws these; only the CLI turns them into messages and exit codes.
 */

import type { GenerationAttempt } from './ai/generator.js';

/** No API credential could be resolved. */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/** The scan root is missing or is not a directory. */
export class InvalidRootError extends Error {
    constructor(
        message: string,
        public readonly root: string,
    ) {
        super(message);
        this.name = 'InvalidRootError';
    }
}

/** Every file under the root was filtered out or unreadable. */
export class ScanEmptyError extends Error {
    constructor(
        message: string,
        public readonly root: string,
    ) {
        super(message);
        this.name = 'ScanEmptyError';
    }
}

/** All candidate models failed or returned nothing. */
export class GenerationError extends Error {
    constructor(
        message: string,
        public readonly attempts: GenerationAttempt[],
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'GenerationError';
    }

    /** The error raised by the last model that failed, if any did. */
    get lastError(): unknown {
        return this.cause;
    }
}
