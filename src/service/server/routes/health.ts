/**
 * Health check router
 */
import { Router, type Request, type Response, type IRouter } from 'express';
import { buildHealthReport } from '../../../../api/_lib/healthCheck.js';
import type { QueryServices } from '../../services.js';

export function createHealthRouter(services: QueryServices): IRouter {
    const router: IRouter = Router();

    router.get('/', (_req: Request, res: Response) => {
        res.json(buildHealthReport(services.indexCache));
    });

    return router;
}
