import { Router } from 'express';
import type { Request, Response } from 'express';
import type { InventoryService } from '../services/inventoryService.js';
import type { ViewRenderer } from '../views/renderer.js';
import { asyncHandler } from '../middleware/asyncHandler.js';

export interface NotesRouterDeps {
    inventory: InventoryService;
    renderer: ViewRenderer;
}

export function createNotesRouter({ inventory, renderer }: NotesRouterDeps): Router {
    const router: Router = Router();

    router.get(
        '/notes',
        asyncHandler(async (req: Request, res: Response) => {
            const notes = await inventory.listNotes(req.sessionState);
            if (!notes) {
                res.redirect('/');
                return;
            }
            renderer.render(res, 'notes', { notes });
        })
    );

    router.post(
        '/add_note',
        asyncHandler(async (req: Request, res: Response) => {
            const outcome = await inventory.addNote(req.sessionState, req.body ?? {});
            const anonymous = outcome.status === 'rejected' && outcome.reason === 'unauthenticated';
            res.redirect(anonymous ? '/' : '/notes');
        })
    );

    return router;
}

export default createNotesRouter;
