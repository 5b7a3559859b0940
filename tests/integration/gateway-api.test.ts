/**
 * Integration Tests: HTTP surface of the gateway
 * The app runs in process against the mock backend; nothing leaves the test.
 */

import request from 'supertest';
import { Application } from 'express';
import nock from 'nock';
import { createApp } from '../../src/presentation/app';
import { BackendUnavailableError } from '../../src/domain/errors/GatewayErrors';
import { RecordingProvider } from '../helpers/RecordingProvider';
import { createTestConfig, TEST_API_KEY } from '../helpers/testConfig';

const AUTH = `Bearer ${TEST_API_KEY}`;

describe('Gateway API', () => {
    let provider: RecordingProvider;
    let app: Application;

    beforeEach(() => {
        jest.spyOn(console, 'log').mockImplementation(() => { });
        jest.spyOn(console, 'warn').mockImplementation(() => { });
        jest.spyOn(console, 'error').mockImplementation(() => { });
        provider = new RecordingProvider();
        app = createApp(createTestConfig(), provider);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('GET /health', () => {
        it('should answer without a credential', async () => {
            const res = await request(app).get('/health');

            expect(res.status).toBe(200);
            expect(res.body.status).toBe('ok');
            expect(res.body.version).toBe('2.0.0');
            expect(res.headers['access-control-allow-origin']).toBe('*');
        });
    });

    describe('POST /translate', () => {
        it('should translate with the mock backend', async () => {
            const res = await request(app)
                .post('/translate')
                .set('Authorization', AUTH)
                .send({ text: 'Hello world', source_lang: 'en', target_lang: 'es', mode: 'simple' });

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                translation: '<mock:es>Hello world',
                source_lang: 'en',
                target_lang: 'es',
                confidence: 1,
                mode: 'simple',
            });
        });

        it('should accept the bearer scheme in any case', async () => {
            const res = await request(app)
                .post('/translate')
                .set('Authorization', `bearer ${TEST_API_KEY}`)
                .send({ text: 'Hi', source_lang: 'en', target_lang: 'fr' });

            expect(res.status).toBe(200);
        });

        it.each([
            ['no header', undefined],
            ['an unknown key', 'Bearer wrong-key'],
            ['another scheme', `Basic ${TEST_API_KEY}`],
            ['a bare key', TEST_API_KEY],
        ])('should answer 401 for %s without calling the backend', async (_label, header) => {
            const call = request(app).post('/translate');
            if (header !== undefined) {
                call.set('Authorization', header);
            }
            const res = await call.send({ text: 'Hello', source_lang: 'en', target_lang: 'es' });

            expect(res.status).toBe(401);
            expect(res.body).toEqual({ error: { message: 'Invalid or missing API key', code: 'UNAUTHORIZED' } });
            expect(provider.callCount).toBe(0);
        });

        it('should answer 400 for empty text', async () => {
            const res = await request(app)
                .post('/translate')
                .set('Authorization', AUTH)
                .send({ text: '', source_lang: 'en', target_lang: 'es' });

            expect(res.status).toBe(400);
            expect(res.body).toEqual({ error: { message: 'text cannot be empty', code: 'VALIDATION_ERROR' } });
            expect(provider.callCount).toBe(0);
        });

        it('should answer 400 for a malformed JSON body once authorized', async () => {
            const res = await request(app)
                .post('/translate')
                .set('Authorization', AUTH)
                .set('Content-Type', 'application/json')
                .send('{"text": ');

            expect(res.status).toBe(400);
            expect(res.body).toEqual({
                error: { message: 'Request body must be valid JSON', code: 'VALIDATION_ERROR' },
            });
        });

        it('should answer 401 for an oversized body without a credential', async () => {
            const res = await request(app)
                .post('/translate')
                .send({ text: 'x'.repeat(2 * 1024 * 1024), source_lang: 'en', target_lang: 'es' });

            expect(res.status).toBe(401);
            expect(res.body).toEqual({ error: { message: 'Invalid or missing API key', code: 'UNAUTHORIZED' } });
            expect(provider.callCount).toBe(0);
        });

        it('should answer 400 for an oversized body once authorized', async () => {
            const res = await request(app)
                .post('/translate')
                .set('Authorization', AUTH)
                .send({ text: 'x'.repeat(2 * 1024 * 1024), source_lang: 'en', target_lang: 'es' });

            expect(res.status).toBe(400);
            expect(res.body).toEqual({
                error: { message: 'Request body could not be read: request entity too large', code: 'VALIDATION_ERROR' },
            });
            expect(provider.callCount).toBe(0);
        });

        it('should check the credential before rejecting a malformed body', async () => {
            const res = await request(app)
                .post('/translate')
                .set('Content-Type', 'application/json')
                .send('{"text": ');

            expect(res.status).toBe(401);
            expect(provider.callCount).toBe(0);
        });

        it('should include the detected language in chain mode', async () => {
            const res = await request(app)
                .post('/translate')
                .set('Authorization', AUTH)
                .send({ text: 'Hello', source_lang: 'en', target_lang: 'de', mode: 'chain' });

            expect(res.status).toBe(200);
            expect(res.body.mode).toBe('chain');
            expect(typeof res.body.detected_language).toBe('string');
            expect(provider.callCount).toBe(4);
        });

        it('should answer 502 with the failed stage when the chain breaks', async () => {
            provider = new RecordingProvider({ failOnCall: 3, error: new BackendUnavailableError('timed out', 'mock') });
            app = createApp(createTestConfig(), provider);

            const res = await request(app)
                .post('/translate')
                .set('Authorization', AUTH)
                .send({ text: 'Hello', source_lang: 'en', target_lang: 'de', mode: 'chain' });

            expect(res.status).toBe(502);
            expect(res.body).toEqual({
                error: {
                    message: 'Prompt chain failed at stage 3 (translate): timed out',
                    code: 'CHAIN_STAGE_FAILURE',
                    details: { stage: 3, stageName: 'translate' },
                },
            });
            expect(provider.callCount).toBe(3);
        });

        it('should answer 503 when the backend is unavailable', async () => {
            provider = new RecordingProvider({ failOnCall: 1, error: new BackendUnavailableError('connection refused', 'mock') });
            app = createApp(createTestConfig(), provider);

            const res = await request(app)
                .post('/translate')
                .set('Authorization', AUTH)
                .send({ text: 'Hello', source_lang: 'en', target_lang: 'de' });

            expect(res.status).toBe(503);
            expect(res.body.error.code).toBe('BACKEND_UNAVAILABLE');
        });

        it('should answer 500 without leaking unexpected errors in production', async () => {
            const originalEnv = process.env.NODE_ENV;
            process.env.NODE_ENV = 'production';
            provider = new RecordingProvider({ failOnCall: 1, error: new TypeError('cannot read property') });
            app = createApp(createTestConfig(), provider);

            const res = await request(app)
                .post('/translate')
                .set('Authorization', AUTH)
                .send({ text: 'Hello', source_lang: 'en', target_lang: 'de' });

            process.env.NODE_ENV = originalEnv;
            expect(res.status).toBe(500);
            expect(res.body).toEqual({ error: { message: 'Internal server error', code: 'INTERNAL_ERROR' } });
        });
    });

    describe('POST /translate-batch', () => {
        it('should keep input order', async () => {
            const res = await request(app)
                .post('/translate-batch')
                .set('Authorization', AUTH)
                .send({ texts: ['Hello', 'Goodbye'], source_lang: 'en', target_lang: 'fr' });

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                count: 2,
                failed: 0,
                mode: 'simple',
                translations: [
                    { original: 'Hello', translation: '<mock:fr>Hello' },
                    { original: 'Goodbye', translation: '<mock:fr>Goodbye' },
                ],
            });
        });

        it('should report per-item failures with 200', async () => {
            provider = new RecordingProvider({ failTexts: ['Goodbye'], error: new BackendUnavailableError('timed out', 'mock') });
            app = createApp(createTestConfig(), provider);

            const res = await request(app)
                .post('/translate-batch')
                .set('Authorization', AUTH)
                .send({ texts: ['Hello', 'Goodbye'], source_lang: 'en', target_lang: 'fr' });

            expect(res.status).toBe(200);
            expect(res.body.failed).toBe(1);
            expect(res.body.translations[1]).toEqual({
                original: 'Goodbye',
                translation: null,
                error: { code: 'BACKEND_UNAVAILABLE', message: 'timed out' },
            });
        });

        it('should answer 400 for batches over the limit', async () => {
            app = createApp(createTestConfig({ maxBatchSize: 2 }), provider);

            const res = await request(app)
                .post('/translate-batch')
                .set('Authorization', AUTH)
                .send({ texts: ['a', 'b', 'c'], source_lang: 'en', target_lang: 'fr' });

            expect(res.status).toBe(400);
            expect(res.body.error.message).toBe('texts cannot contain more than 2 items');
            expect(provider.callCount).toBe(0);
        });
    });

    describe('POST /chat', () => {
        it('should relay the backend reply', async () => {
            const res = await request(app)
                .post('/chat')
                .set('Authorization', AUTH)
                .send({ message: 'How do you say thank you in Japanese?' });

            expect(res.status).toBe(200);
            expect(res.body.response).toBe('<mock:chat>How do you say thank you in Japanese?');
            expect(typeof res.body.timestamp).toBe('string');
        });

        it('should require a credential', async () => {
            const res = await request(app).post('/chat').send({ message: 'Hi' });

            expect(res.status).toBe(401);
        });
    });

    describe('Informational routes', () => {
        it('should list languages for authenticated callers', async () => {
            const res = await request(app).get('/languages').set('Authorization', AUTH);

            expect(res.status).toBe(200);
            expect(res.body.total).toBe(20);
            expect(res.body.languages[1]).toEqual({ code: 'es', name: 'Spanish' });
        });

        it('should reject unauthenticated language listing', async () => {
            const res = await request(app).get('/languages');

            expect(res.status).toBe(401);
        });

        it('should describe the backend model', async () => {
            const res = await request(app).get('/api/models').set('Authorization', AUTH);

            expect(res.status).toBe(200);
            expect(res.body.recommended).toBe('mock-echo');
        });

        it('should answer 404 for unknown routes', async () => {
            const res = await request(app).get('/nope').set('Authorization', AUTH);

            expect(res.status).toBe(404);
            expect(res.body).toEqual({ error: { message: 'Route not found: GET /nope', code: 'NOT_FOUND' } });
        });
    });

    describe('Hosted backend wiring', () => {
        const baseUrl = 'https://llm.example.test/v1';

        afterEach(() => {
            nock.cleanAll();
        });

        it('should route translations through the configured hosted backend', async () => {
            const scope = nock(baseUrl)
                .matchHeader('authorization', 'Bearer test-secret')
                .post('/chat/completions')
                .reply(200, { choices: [{ message: { role: 'assistant', content: 'Hola' } }] });
            const hostedApp = createApp(createTestConfig({
                backendProvider: 'hosted',
                llmApiKey: 'test-secret',
                llmBaseUrl: baseUrl,
            }));

            const res = await request(hostedApp)
                .post('/translate')
                .set('Authorization', AUTH)
                .send({ text: 'Hello', source_lang: 'en', target_lang: 'es' });

            expect(res.status).toBe(200);
            expect(res.body.translation).toBe('Hola');
            expect(res.body.confidence).toBe(0.95);
            expect(scope.isDone()).toBe(true);
        });
    });
});
