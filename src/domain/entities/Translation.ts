/**
 * Language code as supplied by the caller. Codes are opaque to the gateway and
 * passed through to the backend unchanged.
 */
export type LanguageCode = string;

export type TranslationMode = 'simple' | 'chain';

export const TRANSLATION_MODES: readonly TranslationMode[] = ['simple', 'chain'];

export function isTranslationMode(value: unknown): value is TranslationMode {
    return TRANSLATION_MODES.some((mode) => mode === value);
}

/**
 * A single-text translation request after validation.
 */
export interface TranslationRequest {
    text: string;
    sourceLang: LanguageCode;
    targetLang: LanguageCode;
    mode: TranslationMode;
}

/**
 * A multi-text translation request after validation.
 * Output order always matches the order of `texts`.
 */
export interface BatchTranslationRequest {
    texts: string[];
    sourceLang: LanguageCode;
    targetLang: LanguageCode;
    mode: TranslationMode;
}

/**
 * Outcome of one successful translation.
 */
export interface TranslationResult {
    readonly original: string;
    readonly translation: string;
    /** Opaque quality hint in [0, 1], backend-supplied or defaulted */
    readonly confidence: number;
    readonly mode: TranslationMode;
    /** Source language as reported by the prompt chain's detection stage */
    readonly detectedLanguage?: string;
}

export function createTranslationResult(
    original: string,
    translation: string,
    confidence: number,
    mode: TranslationMode,
    detectedLanguage?: string
): TranslationResult {
    return Object.freeze({
        original,
        translation,
        confidence: clampConfidence(confidence),
        mode,
        ...(detectedLanguage !== undefined && { detectedLanguage }),
    });
}

function clampConfidence(value: number): number {
    if (Number.isNaN(value)) return 0;
    return Math.min(1, Math.max(0, value));
}

/**
 * Stage outputs of one prompt-chain run. Lives only for the duration of that run.
 */
export interface ChainIntermediate {
    detectedLanguage?: string;
    extractedMeaning?: string;
    draftTranslation?: string;
    draftConfidence?: number;
    refinedTranslation?: string;
}

export function isSameLanguage(sourceLang: LanguageCode, targetLang: LanguageCode): boolean {
    return sourceLang.trim().toLowerCase() === targetLang.trim().toLowerCase();
}
