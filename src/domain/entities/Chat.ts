export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

/** Roles a caller may use in `history`. The system turn is always the gateway's own. */
export const HISTORY_ROLES: readonly ChatRole[] = ['user', 'assistant'];

/**
 * A single chat turn. Prior turns, if any, are supplied by the caller;
 * the gateway keeps no conversation state between calls.
 */
export interface ChatRequest {
    message: string;
    history: ChatMessage[];
}
