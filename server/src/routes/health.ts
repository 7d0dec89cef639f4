import { Router } from 'express';
import type { Request, Response } from 'express';
import type { InventoryStore } from '../db/index.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { httpLogger } from '../utils/logger.js';

export function createHealthRouter(store: InventoryStore): Router {
    const router: Router = Router();

    // Liveness + store reachability; not session-gated
    router.get(
        '/health',
        asyncHandler(async (_req: Request, res: Response) => {
            try {
                await store.read((repo) => repo.ping());
                res.json({ status: 'ok' });
            } catch (error) {
                httpLogger.error({ err: error }, 'Health check failed');
                res.status(503).json({ status: 'unavailable' });
            }
        })
    );

    return router;
}

export default createHealthRouter;
