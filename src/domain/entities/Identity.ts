/**
 * The caller an API key belongs to.
 */
export interface Identity {
    readonly label: string;
}
