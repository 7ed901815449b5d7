/**
 * Express app
 * Same endpoints and contracts as the serverless functions under api/.
 */
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { getAllowedOrigin } from '../../../api/_lib/cors.js';
import { handleError } from '../../../api/_lib/errorHandler.js';
import { InvalidRequestError } from '../../../shared/lib/errors.js';
import type { QueryServices } from '../services.js';
import { createAskRouter } from './routes/ask.js';
import { createHealthRouter } from './routes/health.js';

/** body-parser marks unparseable JSON with this type */
function isBodyParseError(error: unknown): boolean {
    return typeof error === 'object'
        && error !== null
        && 'type' in error
        && error.type === 'entity.parse.failed';
}

export function createApp(services: QueryServices): Express {
    const app: Express = express();

    app.use(cors({
        origin: (origin, callback) => {
            callback(null, getAllowedOrigin(origin, services.allowedOrigin) !== null);
        },
        credentials: true,
    }));
    app.use(express.json());

    // request logging
    app.use((req, _res, next) => {
        console.log(`📨 ${req.method} ${req.path}`);
        next();
    });

    app.use('/api/health', createHealthRouter(services));
    app.use('/api/ask', createAskRouter(services));

    app.use((_req, res) => {
        res.status(404).json({ error: 'Not Found' });
    });

    app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
        if (isBodyParseError(error)) {
            handleError(res, new InvalidRequestError('Request body is not valid JSON'));
            return;
        }
        handleError(res, error);
    });

    return app;
}
