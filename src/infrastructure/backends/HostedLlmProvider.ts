import axios, { AxiosError } from 'axios';
import { ChatMessage } from '../../domain/entities/Chat';
import { languageName } from '../../domain/entities/Language';
import { BackendInfo, BackendTranslation, IBackendProvider } from '../../domain/ports/IBackendProvider';
import { BackendRejectedError, BackendUnavailableError } from '../../domain/errors/GatewayErrors';
import {
    CHAT_SYSTEM_PROMPT,
    TRANSLATE_PROMPT,
    TRANSLATOR_SYSTEM_PROMPT,
} from './Prompts';
import { fillPrompt } from '../../domain/services/PromptTemplate';

export interface HostedLlmOptions {
    apiKey: string;
    baseUrl?: string;
    model?: string;
    /** Per-call bound on the HTTP round-trip */
    timeoutMs?: number;
    /** Total attempts for transient statuses (429/502/503); 1 disables retrying */
    maxRetries?: number;
    retryBaseDelayMs?: number;
    maxTokens?: number;
}

interface ChatCompletionResponse {
    choices?: Array<{
        message?: { content?: unknown };
    }>;
}

/** HTTP statuses that mean the backend refused this particular input. */
const REJECTION_STATUSES = new Set([400, 404, 413, 422]);
const RETRYABLE_STATUSES = new Set([429, 502, 503]);
/** ERR_CANCELED comes from the per-call abort signal, which only fires on timeout. */
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT', 'ERR_CANCELED']);

const BACKEND_NAME = 'hosted-llm';

/**
 * Backend that delegates to an OpenAI-compatible chat-completions API
 * (Groq by default).
 */
export class HostedLlmProvider implements IBackendProvider {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;
    private readonly timeoutMs: number;
    private readonly maxRetries: number;
    private readonly retryBaseDelayMs: number;
    private readonly maxTokens: number;

    constructor(options: HostedLlmOptions) {
        if (!options.apiKey) {
            throw new Error('Hosted LLM API key is required');
        }
        this.apiKey = options.apiKey;
        this.baseUrl = (options.baseUrl ?? 'https://api.groq.com/openai/v1').replace(/\/$/, '');
        this.model = options.model ?? 'llama-3.1-8b-instant';
        this.timeoutMs = options.timeoutMs ?? 30000;
        this.maxRetries = Math.max(1, options.maxRetries ?? 1);
        this.retryBaseDelayMs = options.retryBaseDelayMs ?? 1000;
        this.maxTokens = options.maxTokens ?? 1024;
    }

    async translate(text: string, sourceLang: string, targetLang: string): Promise<BackendTranslation> {
        const prompt = fillPrompt(TRANSLATE_PROMPT, {
            sourceLanguage: languageName(sourceLang) ?? sourceLang,
            targetLanguage: languageName(targetLang) ?? targetLang,
            text,
        });

        const content = await this.chatCompletion(
            [
                { role: 'system', content: TRANSLATOR_SYSTEM_PROMPT },
                { role: 'user', content: prompt },
            ],
            0.3
        );

        // The API reports no score; the strategy applies the configured default.
        return { text: stripQuotes(content) };
    }

    async chat(message: string, history: ChatMessage[] = []): Promise<string> {
        return this.chatCompletion(
            [
                { role: 'system', content: CHAT_SYSTEM_PROMPT },
                ...history,
                { role: 'user', content: message },
            ],
            0.7
        );
    }

    describe(): BackendInfo {
        return {
            name: BACKEND_NAME,
            model: this.model,
            capabilities: ['translation', 'chat'],
        };
    }

    private async chatCompletion(messages: ChatMessage[], temperature: number): Promise<string> {
        for (let attempt = 0; ; attempt++) {
            try {
                return await this.executeRequest(messages, temperature);
            } catch (error) {
                if (this.shouldRetry(error, attempt)) {
                    const delay = Math.pow(2, attempt) * this.retryBaseDelayMs;
                    console.warn(`[HostedLLM] Transient error (${statusOf(error)}), retrying in ${delay}ms...`);
                    await new Promise((resolve) => setTimeout(resolve, delay));
                    continue;
                }
                throw this.classifyError(error);
            }
        }
    }

    private async executeRequest(messages: ChatMessage[], temperature: number): Promise<string> {
        const response = await axios.post<ChatCompletionResponse>(
            `${this.baseUrl}/chat/completions`,
            {
                model: this.model,
                messages,
                temperature,
                max_tokens: this.maxTokens,
            },
            {
                headers: {
                    Authorization: `Bearer ${this.apiKey}`,
                    'Content-Type': 'application/json',
                },
                timeout: this.timeoutMs,
                // `timeout` restarts on socket activity; the signal bounds the whole call.
                signal: AbortSignal.timeout(this.timeoutMs),
            }
        );

        const content = response.data?.choices?.[0]?.message?.content;
        if (typeof content !== 'string' || content.trim().length === 0) {
            throw new BackendUnavailableError('Hosted LLM returned an empty or malformed completion', BACKEND_NAME);
        }
        return content.trim();
    }

    private shouldRetry(error: unknown, attempt: number): boolean {
        const status = statusOf(error);
        return status !== undefined && RETRYABLE_STATUSES.has(status) && attempt < this.maxRetries - 1;
    }

    private classifyError(error: unknown): BackendUnavailableError | BackendRejectedError {
        if (error instanceof BackendUnavailableError) {
            return error;
        }
        if (!axios.isAxiosError(error)) {
            return new BackendUnavailableError(`Hosted LLM call failed: ${String(error)}`, BACKEND_NAME, { cause: error });
        }

        if (!error.response) {
            const timedOut = TIMEOUT_CODES.has(error.code ?? '');
            const message = timedOut
                ? `Hosted LLM timed out after ${this.timeoutMs}ms`
                : `Hosted LLM unreachable: ${error.message}`;
            return new BackendUnavailableError(message, BACKEND_NAME, { cause: error });
        }

        const status = error.response.status;
        const detail = apiErrorMessage(error);
        if (REJECTION_STATUSES.has(status)) {
            return new BackendRejectedError(`Hosted LLM rejected the request (${status}): ${detail}`, BACKEND_NAME, { cause: error });
        }
        return new BackendUnavailableError(`Hosted LLM call failed (${status}): ${detail}`, BACKEND_NAME, { cause: error });
    }
}

function statusOf(error: unknown): number | undefined {
    return axios.isAxiosError(error) ? error.response?.status : undefined;
}

function apiErrorMessage(error: AxiosError): string {
    const data: unknown = error.response?.data;
    if (typeof data === 'object' && data !== null && 'error' in data) {
        const inner: unknown = data.error;
        if (typeof inner === 'object' && inner !== null && 'message' in inner && typeof inner.message === 'string') {
            return inner.message;
        }
        if (typeof inner === 'string') {
            return inner;
        }
    }
    return error.message;
}

const QUOTE_PAIRS: Record<string, string> = { '"': '"', "'": "'", '“': '”', '«': '»' };

/**
 * Models sometimes wrap the whole answer in quotes despite the instructions.
 */
function stripQuotes(text: string): string {
    if (text.length < 2) return text;
    const closing = QUOTE_PAIRS[text[0]];
    if (closing !== undefined && text.endsWith(closing)) {
        return text.slice(1, -1).trim();
    }
    return text;
}
