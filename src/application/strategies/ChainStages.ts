import { ChainIntermediate, LanguageCode } from '../../domain/entities/Translation';
import { languageName } from '../../domain/entities/Language';
import { IBackendProvider } from '../../domain/ports/IBackendProvider';
import { ChainStageFailureError, errorMessage } from '../../domain/errors/GatewayErrors';
import { fillPrompt } from '../../domain/services/PromptTemplate';
import {
    DETECT_LANGUAGE_PROMPT,
    EXTRACT_MEANING_PROMPT,
    MEANING_LANGUAGE,
    REFINE_TRANSLATION_PROMPT,
} from './ChainPrompts';

/**
 * Everything one chain run works with. `intermediate` is owned by that run.
 */
export interface ChainContext {
    readonly text: string;
    readonly sourceLang: LanguageCode;
    readonly targetLang: LanguageCode;
    readonly provider: IBackendProvider;
    readonly intermediate: Readonly<ChainIntermediate>;
}

/**
 * A single backend call of the chain. Returns the intermediate extended with
 * its own output.
 */
export interface ChainStage {
    readonly name: string;
    run(context: ChainContext): Promise<ChainIntermediate>;
}

export class DetectLanguageStage implements ChainStage {
    readonly name = 'detect-language';

    async run({ text, provider, intermediate }: ChainContext): Promise<ChainIntermediate> {
        const detected = await provider.chat(fillPrompt(DETECT_LANGUAGE_PROMPT, { text }));
        return { ...intermediate, detectedLanguage: requireOutput(detected) };
    }
}

export class ExtractMeaningStage implements ChainStage {
    readonly name = 'extract-meaning';

    async run({ text, provider, intermediate }: ChainContext): Promise<ChainIntermediate> {
        const prompt = fillPrompt(EXTRACT_MEANING_PROMPT, {
            detectedLanguage: intermediate.detectedLanguage ?? 'an unknown language',
            text,
        });
        const meaning = await provider.chat(prompt);
        return { ...intermediate, extractedMeaning: requireOutput(meaning) };
    }
}

export class TranslateMeaningStage implements ChainStage {
    readonly name = 'translate';

    async run({ targetLang, provider, intermediate }: ChainContext): Promise<ChainIntermediate> {
        const meaning = requireOutput(intermediate.extractedMeaning);
        const draft = await provider.translate(meaning, MEANING_LANGUAGE, targetLang);
        return {
            ...intermediate,
            draftTranslation: requireOutput(draft.text),
            draftConfidence: draft.confidence,
        };
    }
}

export class RefineTranslationStage implements ChainStage {
    readonly name = 'refine';

    async run({ targetLang, provider, intermediate }: ChainContext): Promise<ChainIntermediate> {
        const prompt = fillPrompt(REFINE_TRANSLATION_PROMPT, {
            targetLanguage: languageName(targetLang) ?? targetLang,
            draft: requireOutput(intermediate.draftTranslation),
        });
        const refined = await provider.chat(prompt);
        return { ...intermediate, refinedTranslation: requireOutput(refined) };
    }
}

export function createChainStages(): ChainStage[] {
    return [
        new DetectLanguageStage(),
        new ExtractMeaningStage(),
        new TranslateMeaningStage(),
        new RefineTranslationStage(),
    ];
}

/**
 * Runs the stages strictly in order. The first failure aborts the run and is
 * attributed to its 1-based stage index; no intermediate output escapes.
 */
export async function executeChain(
    context: Omit<ChainContext, 'intermediate'>,
    stages: readonly ChainStage[]
): Promise<ChainIntermediate> {
    let intermediate: ChainIntermediate = {};

    for (const [index, stage] of stages.entries()) {
        try {
            intermediate = await stage.run({ ...context, intermediate });
        } catch (error) {
            console.warn(`[PromptChain] Stage ${index + 1} (${stage.name}) failed: ${errorMessage(error)}`);
            throw new ChainStageFailureError(index + 1, stage.name, error);
        }
    }

    return intermediate;
}

function requireOutput(value: string | undefined): string {
    const trimmed = value?.trim();
    if (!trimmed) {
        throw new Error('stage produced no output');
    }
    return trimmed;
}
