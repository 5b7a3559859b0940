import express, { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { UnreadableBody } from '../../application/RequestValidation';

/**
 * body-parser tags the errors it raises while reading a body with a `type`
 * (`entity.parse.failed`, `entity.too.large`, ...) and a client `status`.
 */
function bodyReadFailure(err: Error): string | undefined {
    if (!('type' in err) || typeof err.type !== 'string') {
        return undefined;
    }
    if (err.type === 'entity.parse.failed') {
        return 'Request body must be valid JSON';
    }
    if ('status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500) {
        return `Request body could not be read: ${err.message}`;
    }
    return undefined;
}

/**
 * JSON body parsing that leaves rejection to the routes. A body that cannot be
 * read is replaced by an `UnreadableBody`, so the credential is still checked
 * before the request fails validation.
 */
export function jsonBody(limit: string): Array<RequestHandler | ErrorRequestHandler> {
    const deferBodyFailure = (err: Error, req: Request, _res: Response, next: NextFunction): void => {
        const reason = bodyReadFailure(err);
        if (reason === undefined) {
            next(err);
            return;
        }
        console.warn(`[WARN] Unreadable request body deferred: ${err.message} (${req.method} ${req.path})`);
        req.body = new UnreadableBody(reason);
        next();
    };

    return [express.json({ limit }), deferBodyFailure];
}
