import { MockBackendProvider } from '../../../../src/infrastructure/backends/MockBackendProvider';

describe('MockBackendProvider', () => {
    const provider = new MockBackendProvider();

    it('should tag the text with the target language', async () => {
        await expect(provider.translate('Hello world', 'en', 'es')).resolves.toEqual({
            text: '<mock:es>Hello world',
            confidence: 1.0,
        });
    });

    it('should return identical output for identical input', async () => {
        const first = await provider.translate('Guten Tag', 'de', 'ja');
        const second = await new MockBackendProvider().translate('Guten Tag', 'de', 'ja');

        expect(second).toEqual(first);
    });

    it('should echo chat messages regardless of history', async () => {
        await expect(provider.chat('Hi')).resolves.toBe('<mock:chat>Hi');
        await expect(provider.chat('Hi', [{ role: 'user', content: 'earlier' }])).resolves.toBe('<mock:chat>Hi');
    });

    it('should describe itself', () => {
        expect(provider.describe()).toEqual({
            name: 'mock',
            model: 'mock-echo',
            capabilities: ['translation', 'chat'],
        });
    });
});
