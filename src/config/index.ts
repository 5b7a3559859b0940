import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

export const BACKEND_KINDS = ['mock', 'hosted'] as const;
export type BackendKind = typeof BACKEND_KINDS[number];

function isBackendKind(value: string): value is BackendKind {
    return BACKEND_KINDS.some((kind) => kind === value);
}

/**
 * Application configuration loaded from environment variables.
 * Read once at startup and treated as immutable afterwards.
 */
export interface Config {
    // Server
    port: number;
    environment: string;
    version: string;
    corsOrigins: string[];

    // Authorization: API key -> identity label
    apiKeys: ReadonlyMap<string, string>;

    // Backend
    backendProvider: BackendKind;
    llmApiKey: string;
    llmBaseUrl: string;
    llmModel: string;
    llmMaxTokens: number;
    backendTimeoutMs: number;
    backendMaxRetries: number;
    defaultConfidence: number;

    // Request limits
    batchConcurrency: number;
    maxBatchSize: number;
    maxTextLength: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarList(key: string, defaultValue: string): string[] {
    return getEnvVar(key, defaultValue)
        .split(',')
        .map((item) => item.trim())
        .filter((item) => item.length > 0);
}

function getBackendKind(): BackendKind {
    const value = getEnvVar('BACKEND_PROVIDER', 'mock').toLowerCase();
    if (!isBackendKind(value)) {
        throw new Error(`BACKEND_PROVIDER must be "mock" or "hosted", got: ${value}`);
    }
    return value;
}

/**
 * Parses `key:identity` pairs. A bare key maps to the identity "user".
 * ADMIN_API_KEY, when set, maps to "admin".
 */
export function parseApiKeys(raw: string, adminKey: string): Map<string, string> {
    const keys = new Map<string, string>();

    for (const entry of raw.split(',')) {
        const trimmed = entry.trim();
        if (!trimmed) continue;
        const separator = trimmed.indexOf(':');
        if (separator === -1) {
            keys.set(trimmed, 'user');
            continue;
        }
        const key = trimmed.substring(0, separator).trim();
        const identity = trimmed.substring(separator + 1).trim() || 'user';
        if (key) keys.set(key, identity);
    }

    if (adminKey) {
        keys.set(adminKey, 'admin');
    }
    return keys;
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 8000),
        environment: getEnvVar('NODE_ENV', 'development'),
        version: getEnvVar('APP_VERSION', '2.0.0'),
        corsOrigins: getEnvVarList('CORS_ORIGINS', '*'),

        // Authorization
        apiKeys: parseApiKeys(getEnvVar('API_KEYS', ''), getEnvVar('ADMIN_API_KEY', '')),

        // Backend
        backendProvider: getBackendKind(),
        llmApiKey: getEnvVar('LLM_API_KEY', ''),
        llmBaseUrl: getEnvVar('LLM_BASE_URL', 'https://api.groq.com/openai/v1'),
        llmModel: getEnvVar('LLM_MODEL', 'llama-3.1-8b-instant'),
        llmMaxTokens: getEnvVarNumber('LLM_MAX_TOKENS', 1024),
        backendTimeoutMs: getEnvVarNumber('BACKEND_TIMEOUT_MS', 30000),
        backendMaxRetries: getEnvVarNumber('BACKEND_MAX_RETRIES', 1),
        defaultConfidence: getEnvVarNumber('DEFAULT_CONFIDENCE', 0.95),

        // Request limits
        batchConcurrency: getEnvVarNumber('BATCH_CONCURRENCY', 4),
        maxBatchSize: getEnvVarNumber('MAX_BATCH_SIZE', 100),
        maxTextLength: getEnvVarNumber('MAX_TEXT_LENGTH', 5000),
    };
}

/**
 * Validates that the configuration can serve requests.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (config.apiKeys.size === 0) {
        errors.push('At least one API key is required (API_KEYS or ADMIN_API_KEY)');
    }
    if (config.backendProvider === 'hosted' && !config.llmApiKey) {
        errors.push('LLM_API_KEY is required when BACKEND_PROVIDER is "hosted"');
    }
    if (config.defaultConfidence < 0 || config.defaultConfidence > 1) {
        errors.push('DEFAULT_CONFIDENCE must be between 0 and 1');
    }

    const positiveIntegers: Array<[string, number]> = [
        ['PORT', config.port],
        ['LLM_MAX_TOKENS', config.llmMaxTokens],
        ['BACKEND_TIMEOUT_MS', config.backendTimeoutMs],
        ['BACKEND_MAX_RETRIES', config.backendMaxRetries],
        ['BATCH_CONCURRENCY', config.batchConcurrency],
        ['MAX_BATCH_SIZE', config.maxBatchSize],
        ['MAX_TEXT_LENGTH', config.maxTextLength],
    ];
    for (const [name, value] of positiveIntegers) {
        if (!Number.isInteger(value) || value < 1) {
            errors.push(`${name} must be a positive integer`);
        }
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
