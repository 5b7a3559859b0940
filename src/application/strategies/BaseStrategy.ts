import {
    LanguageCode,
    TranslationMode,
    TranslationResult,
    createTranslationResult,
    isSameLanguage,
} from '../../domain/entities/Translation';
import { IBackendProvider } from '../../domain/ports/IBackendProvider';
import { ITranslationStrategy } from '../../domain/ports/ITranslationStrategy';

/**
 * Shared behaviour of all strategies: a same-language request is answered
 * with the text itself and never reaches the backend.
 */
export abstract class BaseStrategy implements ITranslationStrategy {
    abstract readonly mode: TranslationMode;

    constructor(protected readonly defaultConfidence: number) { }

    async execute(
        text: string,
        sourceLang: LanguageCode,
        targetLang: LanguageCode,
        provider: IBackendProvider
    ): Promise<TranslationResult> {
        if (isSameLanguage(sourceLang, targetLang)) {
            return createTranslationResult(text, text, 1.0, this.mode);
        }
        return this.translate(text, sourceLang, targetLang, provider);
    }

    protected abstract translate(
        text: string,
        sourceLang: LanguageCode,
        targetLang: LanguageCode,
        provider: IBackendProvider
    ): Promise<TranslationResult>;
}
