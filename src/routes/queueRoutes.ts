// src/routes/queueRoutes.ts

import { Router, Request, Response } from 'express';
import { QueueManager } from '../engine/queueManager';
import { EntryNotFoundError } from '../errors';
import { asyncHandler } from './asyncHandler';
import { AddToQueueBodySchema, parseBody } from './schemas';

/**
 * Specialization queue routes - HTTP mapping only
 * Business logic delegated to QueueManager
 */
export function createQueueRoutes(queueManager: QueueManager): Router {
    const router = Router();

    /**
     * All queues held in memory
     * GET /queues
     */
    router.get('/', asyncHandler(async (_req: Request, res: Response) => {
        const queues = await queueManager.getAllQueues();
        res.json({ queues });
    }));

    /**
     * One specialization's queue in serve order
     * GET /queues/:specializationKey
     */
    router.get('/:specializationKey', asyncHandler(async (req: Request, res: Response) => {
        const { specializationKey } = req.params;
        const queue = await queueManager.getQueue(specializationKey);

        res.json({
            specializationKey,
            queueLength: queue.length,
            queue
        });
    }));

    /**
     * Queue analytics
     * GET /queues/:specializationKey/statistics
     */
    router.get('/:specializationKey/statistics', asyncHandler(async (req: Request, res: Response) => {
        const statistics = await queueManager.getStatistics(req.params.specializationKey);
        res.json({ statistics });
    }));

    /**
     * Add a patient to the queue
     * POST /queues/:specializationKey/entries
     * Body: { patientRef, priority? }
     */
    router.post('/:specializationKey/entries', asyncHandler(async (req: Request, res: Response) => {
        const { patientRef, priority } = parseBody(AddToQueueBodySchema, req.body);
        const entry = await queueManager.addToQueue(patientRef, req.params.specializationKey, priority);

        // Already served or removed by another desk before the lookup
        const location = await queueManager.getEntry(entry.id).catch((error: unknown) => {
            if (error instanceof EntryNotFoundError) {
                return null;
            }
            throw error;
        });

        res.status(201).json({
            entry,
            position: location?.position ?? null,
            estimatedWaitMs: location?.estimatedWaitMs ?? null
        });
    }));

    /**
     * Serve the next patient
     * POST /queues/:specializationKey/serve-next
     */
    router.post('/:specializationKey/serve-next', asyncHandler(async (req: Request, res: Response) => {
        const entry = await queueManager.serveNext(req.params.specializationKey);
        res.json({ entry, message: 'Patient served' });
    }));

    return router;
}
