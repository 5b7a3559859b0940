import { TranslationResult, createTranslationResult } from '../../domain/entities/Translation';
import { IBackendProvider } from '../../domain/ports/IBackendProvider';
import { BaseStrategy } from './BaseStrategy';

/**
 * One backend round-trip. Lowest latency.
 */
export class SimpleStrategy extends BaseStrategy {
    readonly mode = 'simple' as const;

    protected async translate(
        text: string,
        sourceLang: string,
        targetLang: string,
        provider: IBackendProvider
    ): Promise<TranslationResult> {
        const output = await provider.translate(text, sourceLang, targetLang);
        return createTranslationResult(text, output.text, output.confidence ?? this.defaultConfidence, this.mode);
    }
}
