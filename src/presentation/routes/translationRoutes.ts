import { Router, Request, Response } from 'express';
import { AuthGate } from '../../application/AuthGate';
import { RequestRouter } from '../../application/RequestRouter';
import { asyncHandler } from '../middleware/errorHandler';

function credentialOf(req: Request): string | undefined {
    return AuthGate.credentialFromHeader(req.header('authorization'));
}

/**
 * Creates the authenticated gateway routes.
 * Authorization happens inside RequestRouter, before the body is looked at.
 */
export function createTranslationRoutes(requestRouter: RequestRouter): Router {
    const router = Router();

    /**
     * POST /translate
     *
     * Translates one text with the requested mode (simple | chain).
     */
    router.post(
        '/translate',
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await requestRouter.translate(credentialOf(req), req.body));
        })
    );

    /**
     * POST /translate-batch
     *
     * Translates several texts. Output order matches input order; failed
     * items carry an error instead of a translation.
     */
    router.post(
        '/translate-batch',
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await requestRouter.translateBatch(credentialOf(req), req.body));
        })
    );

    /**
     * POST /chat
     *
     * Single-turn passthrough to the backend. Prior turns may be supplied in `history`.
     */
    router.post(
        '/chat',
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await requestRouter.chat(credentialOf(req), req.body));
        })
    );

    router.get(
        '/languages',
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await requestRouter.listLanguages(credentialOf(req)));
        })
    );

    router.get(
        '/api/models',
        asyncHandler(async (req: Request, res: Response) => {
            res.json(await requestRouter.listModels(credentialOf(req)));
        })
    );

    return router;
}
