import { ChatMessage } from '../../domain/entities/Chat';
import { BackendInfo, BackendTranslation, IBackendProvider } from '../../domain/ports/IBackendProvider';

/**
 * Offline backend for tests and demos.
 * Output is a pure function of the input: no I/O, no state.
 */
export class MockBackendProvider implements IBackendProvider {
    static readonly CONFIDENCE = 1.0;

    async translate(text: string, _sourceLang: string, targetLang: string): Promise<BackendTranslation> {
        return {
            text: `<mock:${targetLang}>${text}`,
            confidence: MockBackendProvider.CONFIDENCE,
        };
    }

    async chat(message: string, _history?: ChatMessage[]): Promise<string> {
        return `<mock:chat>${message}`;
    }

    describe(): BackendInfo {
        return {
            name: 'mock',
            model: 'mock-echo',
            capabilities: ['translation', 'chat'],
        };
    }
}
