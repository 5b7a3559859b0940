import { TranslationResult, createTranslationResult } from '../../domain/entities/Translation';
import { languageName } from '../../domain/entities/Language';
import { IBackendProvider } from '../../domain/ports/IBackendProvider';
import { BaseStrategy } from './BaseStrategy';
import { ChainStage, createChainStages, executeChain } from './ChainStages';

/**
 * Four sequential backend calls: detect → extract meaning → translate → refine.
 * Trades latency for quality on idiomatic input.
 */
export class PromptChainStrategy extends BaseStrategy {
    readonly mode = 'chain' as const;

    constructor(
        defaultConfidence: number,
        private readonly stages: readonly ChainStage[] = createChainStages()
    ) {
        super(defaultConfidence);
    }

    protected async translate(
        text: string,
        sourceLang: string,
        targetLang: string,
        provider: IBackendProvider
    ): Promise<TranslationResult> {
        const outcome = await executeChain({ text, sourceLang, targetLang, provider }, this.stages);

        if (outcome.refinedTranslation === undefined) {
            throw new Error('Prompt chain finished without a refined translation');
        }

        warnOnLanguageMismatch(sourceLang, outcome.detectedLanguage);

        return createTranslationResult(
            text,
            outcome.refinedTranslation,
            outcome.draftConfidence ?? this.defaultConfidence,
            this.mode,
            outcome.detectedLanguage
        );
    }
}

/**
 * Detection never overrides the caller's source language; a disagreement is
 * only reported.
 */
function warnOnLanguageMismatch(sourceLang: string, detected: string | undefined): void {
    if (!detected) return;
    const expected = languageName(sourceLang);
    if (!expected) return;
    const normalized = detected.toLowerCase();
    if (!normalized.includes(expected.toLowerCase()) && normalized !== sourceLang.toLowerCase()) {
        console.warn(`[PromptChain] Caller said "${sourceLang}" but detection reported "${detected}"`);
    }
}
