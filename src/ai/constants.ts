export const GEMINI_API_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

export const PRIMARY_MODEL = 'gemini-3-pro-preview';
export const FALLBACK_MODEL = 'gemini-2.0-flash-exp';
export const DEFAULT_MODELS: readonly string[] = [PRIMARY_MODEL, FALLBACK_MODEL];

export const DEFAULT_TEMPERATURE = 0.4;
export const DEFAULT_TIMEOUT_MS = 300_000;

export const API_KEY_ENV = 'GEMINI_API_KEY';
export const ENV_FILE_NAME = '.env';
/** Directories searched for the env file: the start directory plus five ancestors */
export const ENV_SEARCH_LEVELS = 6;

export const DEFAULT_OUTPUT = 'Deployer_Guide.md';
