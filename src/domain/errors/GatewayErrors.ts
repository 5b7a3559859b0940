/**
 * Error taxonomy of the gateway. Every failure a request can end in is one of
 * these kinds; the HTTP error handler is the only place that maps them to
 * status codes.
 */
export type GatewayErrorKind =
    | 'unauthorized'
    | 'validation'
    | 'backend_unavailable'
    | 'backend_rejected'
    | 'chain_stage_failure'
    | 'not_found';

export abstract class GatewayError extends Error {
    abstract readonly kind: GatewayErrorKind;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class UnauthorizedError extends GatewayError {
    readonly kind = 'unauthorized' as const;

    constructor(message: string = 'Invalid or missing API key') {
        super(message);
    }
}

export class ValidationError extends GatewayError {
    readonly kind = 'validation' as const;

    constructor(message: string = 'Bad request') {
        super(message);
    }
}

export class NotFoundError extends GatewayError {
    readonly kind = 'not_found' as const;

    constructor(message: string = 'Resource not found') {
        super(message);
    }
}

/**
 * Network failure, timeout or server-side error while talking to the backend.
 * Transient: callers may retry with backoff.
 */
export class BackendUnavailableError extends GatewayError {
    readonly kind = 'backend_unavailable' as const;

    constructor(
        message: string,
        public readonly backend: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

/**
 * The backend explicitly refused the input. Not retryable without changing it.
 */
export class BackendRejectedError extends GatewayError {
    readonly kind = 'backend_rejected' as const;

    constructor(
        message: string,
        public readonly backend: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
    }
}

export class ChainStageFailureError extends GatewayError {
    readonly kind = 'chain_stage_failure' as const;

    constructor(
        /** 1-based index of the failed stage */
        public readonly stage: number,
        public readonly stageName: string,
        cause: unknown
    ) {
        super(`Prompt chain failed at stage ${stage} (${stageName}): ${errorMessage(cause)}`, { cause });
    }
}

export type AnyGatewayError =
    | UnauthorizedError
    | ValidationError
    | NotFoundError
    | BackendUnavailableError
    | BackendRejectedError
    | ChainStageFailureError;

export function isGatewayError(error: unknown): error is AnyGatewayError {
    return error instanceof GatewayError;
}

export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
