import { ChatMessage } from '../entities/Chat';
import { LanguageCode } from '../entities/Translation';

/**
 * Raw translation returned by a backend.
 */
export interface BackendTranslation {
    text: string;
    /** Present only when the backend reports its own score */
    confidence?: number;
}

/**
 * Descriptive metadata of a backend, served by the models endpoint.
 */
export interface BackendInfo {
    name: string;
    model: string;
    capabilities: string[];
}

/**
 * Port for the delegated translation/chat capability.
 *
 * Implementations may be shared across concurrent requests and must not keep
 * per-request state. Failures surface as BackendUnavailableError or
 * BackendRejectedError.
 */
export interface IBackendProvider {
    translate(text: string, sourceLang: LanguageCode, targetLang: LanguageCode): Promise<BackendTranslation>;

    chat(message: string, history?: ChatMessage[]): Promise<string>;

    describe(): BackendInfo;
}
