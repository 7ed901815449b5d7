/**
 * Q&A router
 */
import { Router, type Request, type Response, type IRouter } from 'express';
import { handleError } from '../../../../api/_lib/errorHandler.js';
import type { QueryServices } from '../../services.js';

/**
 * POST /api/ask
 * body: { query: string, k?: number }
 */
export function createAskRouter(services: QueryServices): IRouter {
    const router: IRouter = Router();

    router.post('/', async (req: Request, res: Response) => {
        try {
            const outcome = await services.orchestrator.run(req.body);
            if (outcome.result.isErr()) {
                handleError(res, outcome.result.error);
                return;
            }
            res.json(outcome.result.value);
        } catch (error) {
            handleError(res, error);
        }
    });

    return router;
}
