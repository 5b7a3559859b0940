import { ChatMessage, ChatRequest, ChatRole, HISTORY_ROLES } from '../domain/entities/Chat';
import {
    BatchTranslationRequest,
    TranslationRequest,
    isTranslationMode,
} from '../domain/entities/Translation';
import { ValidationError } from '../domain/errors/GatewayErrors';

export interface RequestLimits {
    maxTextLength: number;
    maxBatchSize: number;
}

/** Shape check only: codes are otherwise opaque and passed to the backend. */
const LANGUAGE_CODE_PATTERN = /^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,8})*$/;

type Body = Record<string, unknown>;

/**
 * Stands in for a request body the transport could not read (malformed JSON,
 * oversized, unsupported encoding). Rejected like any other invalid body, so
 * only after the credential has been checked.
 */
export class UnreadableBody {
    constructor(readonly reason: string) { }
}

function isBody(value: unknown): value is Body {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireBody(body: unknown): Body {
    if (body instanceof UnreadableBody) {
        throw new ValidationError(body.reason);
    }
    if (!isBody(body)) {
        throw new ValidationError('Request body must be a JSON object');
    }
    return body;
}

function requireText(value: unknown, field: string, limits: RequestLimits): string {
    if (typeof value !== 'string') {
        throw new ValidationError(`${field} is required and must be a string`);
    }
    if (value.trim().length === 0) {
        throw new ValidationError(`${field} cannot be empty`);
    }
    if (value.length > limits.maxTextLength) {
        throw new ValidationError(`${field} exceeds the maximum length of ${limits.maxTextLength} characters`);
    }
    return value;
}

function requireLanguage(value: unknown, field: string): string {
    if (typeof value !== 'string' || !LANGUAGE_CODE_PATTERN.test(value.trim())) {
        throw new ValidationError(`${field} must be a language code such as "en" or "pt-BR"`);
    }
    return value.trim();
}

function parseMode(value: unknown): TranslationRequest['mode'] {
    if (value === undefined || value === null) {
        return 'simple';
    }
    if (!isTranslationMode(value)) {
        throw new ValidationError('mode must be "simple" or "chain"');
    }
    return value;
}

export function parseTranslateRequest(body: unknown, limits: RequestLimits): TranslationRequest {
    const input = requireBody(body);
    return {
        text: requireText(input.text, 'text', limits),
        sourceLang: requireLanguage(input.source_lang, 'source_lang'),
        targetLang: requireLanguage(input.target_lang, 'target_lang'),
        mode: parseMode(input.mode),
    };
}

export function parseBatchRequest(body: unknown, limits: RequestLimits): BatchTranslationRequest {
    const input = requireBody(body);
    const { texts } = input;

    if (!Array.isArray(texts)) {
        throw new ValidationError('texts is required and must be an array of strings');
    }
    if (texts.length === 0) {
        throw new ValidationError('texts cannot be empty');
    }
    if (texts.length > limits.maxBatchSize) {
        throw new ValidationError(`texts cannot contain more than ${limits.maxBatchSize} items`);
    }

    return {
        texts: texts.map((text: unknown, index: number) => requireText(text, `texts[${index}]`, limits)),
        sourceLang: requireLanguage(input.source_lang, 'source_lang'),
        targetLang: requireLanguage(input.target_lang, 'target_lang'),
        mode: parseMode(input.mode),
    };
}

function isHistoryRole(value: unknown): value is ChatRole {
    return HISTORY_ROLES.some((role) => role === value);
}

function parseHistory(value: unknown): ChatMessage[] {
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new ValidationError('history must be an array of { role, content } messages');
    }
    return value.map((entry: unknown, index: number) => {
        if (typeof entry !== 'object' || entry === null) {
            throw new ValidationError(`history[${index}] must be an object`);
        }
        const role: unknown = 'role' in entry ? entry.role : undefined;
        const content: unknown = 'content' in entry ? entry.content : undefined;
        if (!isHistoryRole(role)) {
            throw new ValidationError(`history[${index}].role must be one of: ${HISTORY_ROLES.join(', ')}`);
        }
        if (typeof content !== 'string') {
            throw new ValidationError(`history[${index}].content must be a string`);
        }
        return { role, content };
    });
}

export function parseChatRequest(body: unknown, limits: RequestLimits): ChatRequest {
    const input = requireBody(body);
    return {
        message: requireText(input.message, 'message', limits),
        history: parseHistory(input.history),
    };
}
