// src/app.ts

import express, { NextFunction, Request, Response } from 'express';
import type { Logger } from 'pino';
import { QueueManager } from './engine/queueManager';
import { AppError } from './errors';
import { moduleLogger } from './logger';
import { createEntryRoutes } from './routes/entryRoutes';
import { createQueueRoutes } from './routes/queueRoutes';

export interface AppDeps {
    queueManager: QueueManager;
    logger?: Logger;
}

/**
 * Express application setup
 *
 * The QueueManager is built once per process by the caller and injected;
 * the app holds no state of its own.
 */
export function createApp({ queueManager, logger = moduleLogger('http') }: AppDeps): express.Express {
    const app = express();

    // Middleware
    app.use(express.json());

    // Routes
    app.use('/queues', createQueueRoutes(queueManager));
    app.use('/entries', createEntryRoutes(queueManager));

    // Health check
    app.get('/health', (_req, res) => {
        res.json({
            status: 'healthy',
            queues: queueManager.queueCount
        });
    });

    app.use((_req: Request, res: Response) => {
        res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Route not found' } });
    });

    // Error handling
    app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
        if (err instanceof AppError) {
            const { code, message, statusCode } = err.toSafeError();
            if (statusCode >= 500) {
                logger.warn({ code, path: req.path }, message);
            }
            res.status(statusCode).json({ error: { code, message } });
            return;
        }

        // Malformed JSON body from express.json()
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } });
            return;
        }

        logger.error({ err, path: req.path }, 'Unhandled request error');
        res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
    });

    return app;
}
