/**
 * @fileoverview Inventory Routes - stock listing (index view) and stock submission
 *
 * Every outcome of POST /add_stock redirects to the index: duplicate serials,
 * unknown locations and invalid forms are logged by the service, not shown.
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import { formatLocationCode } from '@stockroom/shared';
import type { InventoryService } from '../services/inventoryService.js';
import { isAuthenticated } from '../services/sessionGate.js';
import type { ViewRenderer } from '../views/renderer.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

export interface InventoryRouterDeps {
    inventory: InventoryService;
    renderer: ViewRenderer;
}

export function createInventoryRouter({ inventory, renderer }: InventoryRouterDeps): Router {
    const router: Router = Router();

    // Index - inventory when logged in, login view otherwise
    router.get(
        '/',
        asyncHandler(async (req: Request, res: Response) => {
            const session = req.sessionState;
            const snapshot = await inventory.listInventory(session);

            if (!snapshot || !isAuthenticated(session)) {
                renderer.render(res, 'login');
                return;
            }

            renderer.render(res, 'index', {
                username: session.username,
                users: snapshot.users,
                locations: snapshot.locations,
                stock: snapshot.stock.map((item) => ({
                    ...item,
                    locationCode: formatLocationCode(item.location),
                })),
            });
        })
    );

    router.post(
        '/add_stock',
        asyncHandler(async (req: Request, res: Response) => {
            await inventory.addStock(req.sessionState, req.body ?? {});
            res.redirect('/');
        })
    );

    // Static picture page
    router.get('/show_image', (_req: Request, res: Response) => {
        renderer.render(res, 'image');
    });

    return router;
}

export default createInventoryRouter;
