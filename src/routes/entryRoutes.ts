// src/routes/entryRoutes.ts

import { Router, Request, Response } from 'express';
import { QueueManager } from '../engine/queueManager';
import { asyncHandler } from './asyncHandler';
import { parseBody, RemoveEntryBodySchema, ReprioritizeBodySchema } from './schemas';

/**
 * Queue entry routes - HTTP mapping only
 * Business logic delegated to QueueManager
 */
export function createEntryRoutes(queueManager: QueueManager): Router {
    const router = Router();

    /**
     * Position and estimated wait of a waiting entry
     * GET /entries/:id
     */
    router.get('/:id', asyncHandler(async (req: Request, res: Response) => {
        const location = await queueManager.getEntry(req.params.id);
        res.json(location);
    }));

    /**
     * Serve a specific patient out of order
     * POST /entries/:id/serve
     */
    router.post('/:id/serve', asyncHandler(async (req: Request, res: Response) => {
        const entry = await queueManager.serveSpecific(req.params.id);
        res.json({ entry, message: 'Patient served' });
    }));

    /**
     * Remove a patient from the queue
     * POST /entries/:id/remove
     * Body: { reason? }
     */
    router.post('/:id/remove', asyncHandler(async (req: Request, res: Response) => {
        const { reason } = parseBody(RemoveEntryBodySchema, req.body);
        const entry = await queueManager.removeFromQueue(req.params.id, reason);
        res.json({ entry, message: 'Patient removed from queue' });
    }));

    /**
     * Change a patient's priority
     * PATCH /entries/:id/priority
     * Body: { priority }
     */
    router.patch('/:id/priority', asyncHandler(async (req: Request, res: Response) => {
        const { priority } = parseBody(ReprioritizeBodySchema, req.body);
        const entry = await queueManager.reprioritize(req.params.id, priority);
        res.json({ entry, message: `Priority changed to ${priority}` });
    }));

    return router;
}
