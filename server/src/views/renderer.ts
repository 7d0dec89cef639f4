/**
 * View rendering
 *
 * Routes hand a view name and a plain data model to a ViewRenderer; turning
 * that into a page is the renderer's business. The default renderer answers
 * with the model as JSON so any front end (or a template engine plugged in
 * later) can draw it.
 */

import type { Response } from 'express';

export type ViewName = 'index' | 'login' | 'notes' | 'image';

export type ViewModel = Record<string, unknown>;

export interface ViewRenderer {
    render(res: Response, view: ViewName, model?: ViewModel, status?: number): void;
}

export const jsonViewRenderer: ViewRenderer = {
    render(res, view, model = {}, status = 200) {
        res.status(status).json({ view, ...model });
    },
};
