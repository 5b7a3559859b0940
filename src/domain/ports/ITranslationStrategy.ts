import { LanguageCode, TranslationMode, TranslationResult } from '../entities/Translation';
import { IBackendProvider } from './IBackendProvider';

/**
 * One way of turning a text into a TranslationResult using a backend.
 * Strategies are stateless and shared between requests.
 */
export interface ITranslationStrategy {
    readonly mode: TranslationMode;

    execute(
        text: string,
        sourceLang: LanguageCode,
        targetLang: LanguageCode,
        provider: IBackendProvider
    ): Promise<TranslationResult>;
}
