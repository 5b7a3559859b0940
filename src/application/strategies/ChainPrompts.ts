export const DETECT_LANGUAGE_PROMPT = `Detect the language of this text and respond with ONLY the language name:
"""
{{text}}
"""`;

export const EXTRACT_MEANING_PROMPT = `The following text is written in {{detectedLanguage}}.
Explain its meaning in simple English. Give the meaning only, no translation and no commentary:
"""
{{text}}
"""`;

export const REFINE_TRANSLATION_PROMPT = `Refine this {{targetLanguage}} translation for grammar and fluency so it reads naturally to a native speaker.
Respond with ONLY the refined translation:
"""
{{draft}}
"""`;

/** Language the meaning-extraction stage is asked to write in. */
export const MEANING_LANGUAGE = 'en';
