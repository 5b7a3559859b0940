export interface Language {
    code: string;
    name: string;
}

/**
 * Informational list served by the languages endpoint. The gateway does not
 * restrict translation to these codes.
 */
export const SUPPORTED_LANGUAGES: readonly Language[] = Object.freeze([
    { code: 'en', name: 'English' },
    { code: 'es', name: 'Spanish' },
    { code: 'fr', name: 'French' },
    { code: 'de', name: 'German' },
    { code: 'zh', name: 'Chinese (Simplified)' },
    { code: 'ja', name: 'Japanese' },
    { code: 'ru', name: 'Russian' },
    { code: 'pt', name: 'Portuguese' },
    { code: 'it', name: 'Italian' },
    { code: 'ar', name: 'Arabic' },
    { code: 'hi', name: 'Hindi' },
    { code: 'bn', name: 'Bengali' },
    { code: 'te', name: 'Telugu' },
    { code: 'kn', name: 'Kannada' },
    { code: 'ta', name: 'Tamil' },
    { code: 'tr', name: 'Turkish' },
    { code: 'vi', name: 'Vietnamese' },
    { code: 'th', name: 'Thai' },
    { code: 'ko', name: 'Korean' },
    { code: 'pl', name: 'Polish' },
]);

export function languageName(code: string): string | undefined {
    const normalized = code.trim().toLowerCase();
    return SUPPORTED_LANGUAGES.find((l) => l.code === normalized)?.name;
}
