export const TRANSLATOR_SYSTEM_PROMPT = 'You are an expert multilingual translator. Provide accurate, natural translations preserving the original meaning, tone, and style.';

export const TRANSLATE_PROMPT = `Translate this text from {{sourceLanguage}} to {{targetLanguage}}. Respond with ONLY the translation, no explanation:
"""
{{text}}
"""`;

export const CHAT_SYSTEM_PROMPT = 'You are a helpful multilingual assistant. Answer in the language the user writes in unless asked otherwise.';
