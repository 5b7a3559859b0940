import { Request, Response, NextFunction } from 'express';
import { ChainStageFailureError, NotFoundError, isGatewayError } from '../../domain/errors/GatewayErrors';
import { EXTERNAL_ERRORS } from '../../application/ErrorMapping';

/**
 * Error response structure.
 */
interface ErrorResponse {
    error: {
        message: string;
        code: string;
        details?: unknown;
    };
}

/**
 * Global error handler middleware.
 */
export function errorHandler(
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (isGatewayError(err)) {
        const { status, code } = EXTERNAL_ERRORS[err.kind];
        if (status >= 500) {
            console.error(`[ERROR] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        } else {
            console.warn(`[WARN] ${err.name}: ${err.message} (${req.method} ${req.path})`);
        }

        const response: ErrorResponse = {
            error: {
                message: err.message,
                code,
            },
        };
        if (err instanceof ChainStageFailureError) {
            response.error.details = { stage: err.stage, stageName: err.stageName };
        }
        res.status(status).json(response);
        return;
    }

    console.error(`[ERROR] ${err.name}: ${err.message}`);
    if (err.stack) {
        console.error(err.stack);
    }

    // Generic server error
    const response: ErrorResponse = {
        error: {
            message: process.env.NODE_ENV === 'production'
                ? 'Internal server error'
                : err.message,
            code: EXTERNAL_ERRORS.internal.code,
        },
    };
    res.status(EXTERNAL_ERRORS.internal.status).json(response);
}

/**
 * Fallback for paths no route claims.
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
    next(new NotFoundError(`Route not found: ${req.method} ${req.path}`));
}

/**
 * Async route handler wrapper to catch errors.
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        return Promise.resolve(fn(req, res, next)).catch(next);
    };
}
