import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import { Config } from '../config';
import { AuthGate } from '../application/AuthGate';
import { BatchExecutor } from '../application/BatchExecutor';
import { RequestRouter } from '../application/RequestRouter';
import { createStrategies } from '../application/strategies';
import { IBackendProvider } from '../domain/ports/IBackendProvider';
import { MockBackendProvider } from '../infrastructure/backends/MockBackendProvider';
import { HostedLlmProvider } from '../infrastructure/backends/HostedLlmProvider';

// Route imports
import { createTranslationRoutes } from './routes/translationRoutes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { jsonBody } from './middleware/jsonBody';

/**
 * Creates and configures the Express application.
 * A provider may be passed in to replace the configured backend (tests).
 */
export function createApp(config: Config, provider?: IBackendProvider): Application {
    const app = express();
    const requestRouter = createRequestRouter(config, provider ?? createBackendProvider(config));

    // Middleware
    app.use(cors({
        origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
    }));
    app.use(jsonBody('1mb'));

    // Health check (no credential required)
    app.get('/health', (_req: Request, res: Response) => {
        res.json(requestRouter.health());
    });

    // Routes
    app.use(createTranslationRoutes(requestRouter));

    // Error handler (must be last)
    app.use(notFoundHandler);
    app.use(errorHandler);

    return app;
}

/**
 * Wires the request router from startup configuration. Everything created
 * here is shared read-only by all requests.
 */
export function createRequestRouter(config: Config, provider: IBackendProvider): RequestRouter {
    const authGate = new AuthGate(config.apiKeys);
    console.log(`🔐 ${authGate.size} API key(s) loaded`);

    return new RequestRouter({
        authGate,
        provider,
        strategies: createStrategies(config.defaultConfidence),
        batchExecutor: new BatchExecutor(config.batchConcurrency),
        limits: {
            maxTextLength: config.maxTextLength,
            maxBatchSize: config.maxBatchSize,
        },
        version: config.version,
    });
}

export function createBackendProvider(config: Config): IBackendProvider {
    if (config.backendProvider === 'hosted') {
        console.log(`🧠 Using hosted LLM backend (${config.llmModel} @ ${config.llmBaseUrl})`);
        return new HostedLlmProvider({
            apiKey: config.llmApiKey,
            baseUrl: config.llmBaseUrl,
            model: config.llmModel,
            timeoutMs: config.backendTimeoutMs,
            maxRetries: config.backendMaxRetries,
            maxTokens: config.llmMaxTokens,
        });
    }
    console.log('🧪 Using mock backend (offline, deterministic)');
    return new MockBackendProvider();
}
