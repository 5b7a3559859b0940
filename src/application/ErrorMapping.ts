import { GatewayErrorKind, errorMessage, isGatewayError } from '../domain/errors/GatewayErrors';

export type ErrorKind = GatewayErrorKind | 'internal';

/**
 * Serializable description of a failure, used for per-item batch errors.
 */
export interface ErrorDescriptor {
    kind: ErrorKind;
    message: string;
    stage?: number;
}

export interface ExternalError {
    status: number;
    code: string;
}

/**
 * The one table translating internal failure kinds to what callers see.
 */
export const EXTERNAL_ERRORS: Readonly<Record<ErrorKind, ExternalError>> = Object.freeze({
    unauthorized: { status: 401, code: 'UNAUTHORIZED' },
    validation: { status: 400, code: 'VALIDATION_ERROR' },
    not_found: { status: 404, code: 'NOT_FOUND' },
    backend_rejected: { status: 422, code: 'BACKEND_REJECTED' },
    chain_stage_failure: { status: 502, code: 'CHAIN_STAGE_FAILURE' },
    backend_unavailable: { status: 503, code: 'BACKEND_UNAVAILABLE' },
    internal: { status: 500, code: 'INTERNAL_ERROR' },
});

export function describeError(error: unknown): ErrorDescriptor {
    if (!isGatewayError(error)) {
        return { kind: 'internal', message: errorMessage(error) };
    }
    if (error.kind === 'chain_stage_failure') {
        return { kind: error.kind, message: error.message, stage: error.stage };
    }
    return { kind: error.kind, message: error.message };
}
