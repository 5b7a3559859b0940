import { Identity } from '../domain/entities/Identity';
import { Language, SUPPORTED_LANGUAGES } from '../domain/entities/Language';
import { BackendInfo, IBackendProvider } from '../domain/ports/IBackendProvider';
import { AuthGate } from './AuthGate';
import { BatchExecutor, BatchOutcome } from './BatchExecutor';
import { EXTERNAL_ERRORS } from './ErrorMapping';
import { RequestTrace } from './RequestTrace';
import { RequestLimits, parseBatchRequest, parseChatRequest, parseTranslateRequest } from './RequestValidation';
import { StrategyRegistry } from './strategies';

export interface TranslateResponse {
    translation: string;
    source_lang: string;
    target_lang: string;
    confidence: number;
    mode: string;
    detected_language?: string;
}

export type BatchItemResponse =
    | { original: string; translation: string }
    | { original: string; translation: null; error: { code: string; message: string; stage?: number } };

export interface BatchTranslateResponse {
    count: number;
    failed: number;
    mode: string;
    translations: BatchItemResponse[];
}

export interface ChatResponse {
    response: string;
    timestamp: string;
}

export interface HealthResponse {
    status: 'ok';
    timestamp: string;
    version: string;
}

export interface LanguagesResponse {
    languages: Language[];
    total: number;
}

export interface ModelsResponse {
    models: BackendInfo[];
    recommended: string;
}

export interface RouterDependencies {
    authGate: AuthGate;
    provider: IBackendProvider;
    strategies: StrategyRegistry;
    batchExecutor: BatchExecutor;
    limits: RequestLimits;
    version: string;
}

/**
 * Entry point of every gateway operation. Authorizes first, validates second,
 * and only then touches a strategy or the backend. Errors leave typed.
 */
export class RequestRouter {
    constructor(private readonly deps: RouterDependencies) { }

    health(): HealthResponse {
        return {
            status: 'ok',
            timestamp: new Date().toISOString(),
            version: this.deps.version,
        };
    }

    async translate(credential: string | undefined, body: unknown): Promise<TranslateResponse> {
        return this.handle('translate', credential, async (trace) => {
            const request = parseTranslateRequest(body, this.deps.limits);
            trace.advance('validated');

            const strategy = this.deps.strategies[request.mode];
            trace.advance('dispatched', `${request.sourceLang}→${request.targetLang} (${request.mode})`);
            const result = await strategy.execute(request.text, request.sourceLang, request.targetLang, this.deps.provider);

            return {
                translation: result.translation,
                source_lang: request.sourceLang,
                target_lang: request.targetLang,
                confidence: result.confidence,
                mode: result.mode,
                ...(result.detectedLanguage !== undefined && { detected_language: result.detectedLanguage }),
            };
        });
    }

    async translateBatch(credential: string | undefined, body: unknown): Promise<BatchTranslateResponse> {
        return this.handle('translate-batch', credential, async (trace) => {
            const request = parseBatchRequest(body, this.deps.limits);
            trace.advance('validated');

            const strategy = this.deps.strategies[request.mode];
            trace.advance('dispatched', `${request.texts.length} items ${request.sourceLang}→${request.targetLang} (${request.mode})`);
            const outcomes = await this.deps.batchExecutor.run(
                request.texts,
                request.sourceLang,
                request.targetLang,
                strategy,
                this.deps.provider
            );

            const translations = outcomes.map(toBatchItem);
            return {
                count: translations.length,
                failed: outcomes.filter((o) => !o.ok).length,
                mode: request.mode,
                translations,
            };
        });
    }

    async chat(credential: string | undefined, body: unknown): Promise<ChatResponse> {
        return this.handle('chat', credential, async (trace) => {
            const request = parseChatRequest(body, this.deps.limits);
            trace.advance('validated');

            trace.advance('dispatched', `${request.history.length} prior turns`);
            const response = await this.deps.provider.chat(request.message, request.history);

            return {
                response,
                timestamp: new Date().toISOString(),
            };
        });
    }

    async listLanguages(credential: string | undefined): Promise<LanguagesResponse> {
        return this.handle('languages', credential, async (trace) => {
            trace.advance('validated');
            trace.advance('dispatched');
            return {
                languages: SUPPORTED_LANGUAGES.map((language) => ({ ...language })),
                total: SUPPORTED_LANGUAGES.length,
            };
        });
    }

    async listModels(credential: string | undefined): Promise<ModelsResponse> {
        return this.handle('models', credential, async (trace) => {
            trace.advance('validated');
            trace.advance('dispatched');
            const info = this.deps.provider.describe();
            return {
                models: [info],
                recommended: info.model,
            };
        });
    }

    private async handle<T>(
        operation: string,
        credential: string | undefined,
        work: (trace: RequestTrace, identity: Identity) => Promise<T>
    ): Promise<T> {
        const trace = new RequestTrace(operation);
        try {
            const identity = this.deps.authGate.authorize(credential);
            trace.advance('authorized', `identity=${identity.label}`);

            const response = await work(trace, identity);
            trace.advance('completed');
            return response;
        } catch (error) {
            trace.fail(error);
            throw error;
        }
    }
}

function toBatchItem(outcome: BatchOutcome): BatchItemResponse {
    if (outcome.ok) {
        return { original: outcome.result.original, translation: outcome.result.translation };
    }
    const { code } = EXTERNAL_ERRORS[outcome.error.kind];
    return {
        original: outcome.original,
        translation: null,
        error: {
            code,
            message: outcome.error.message,
            ...(outcome.error.stage !== undefined && { stage: outcome.error.stage }),
        },
    };
}
