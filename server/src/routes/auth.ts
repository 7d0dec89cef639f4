import { Router } from 'express';
import type { Request, Response } from 'express';
import type { AuthService } from '../services/authService.js';
import type { ViewRenderer } from '../views/renderer.js';
import { asyncHandler } from '../middleware/asyncHandler.js';
import { clearSessionCookie, setSessionCookie } from '../middleware/session.js';
import type { SessionCookieOptions } from '../middleware/session.js';

export interface AuthRouterDeps {
    auth: AuthService;
    renderer: ViewRenderer;
    cookie: SessionCookieOptions;
}

/** Form fields arrive as strings; anything else counts as missing */
const formField = (value: unknown): string => (typeof value === 'string' ? value : '');

export function createAuthRouter({ auth, renderer, cookie }: AuthRouterDeps): Router {
    const router: Router = Router();

    // Login - success sets the session cookie, any failure re-renders the login view
    router.post(
        '/login',
        asyncHandler(async (req: Request, res: Response) => {
            const body: Record<string, unknown> = req.body ?? {};
            const result = await auth.login(formField(body.username), formField(body.password));

            if (!result.success) {
                renderer.render(res, 'login', { error: result.error }, 401);
                return;
            }

            setSessionCookie(res, result.token, cookie);
            res.redirect('/');
        })
    );

    // Logout - always succeeds, logged in or not
    router.get('/logout', (_req: Request, res: Response) => {
        auth.logout();
        clearSessionCookie(res, cookie);
        res.redirect('/');
    });

    return router;
}

export default createAuthRouter;
