/**
 * Express application
 *
 * Wires the session gate and services onto the routes. Everything the app
 * needs (store, config, hasher, renderer, clock) is passed in, so tests can
 * build an app around an in-memory store.
 */

import express from 'express';
import type { Express, Request, Response } from 'express';
import cookieParser from 'cookie-parser';
import type { AppConfig } from './config/env.js';
import type { InventoryStore } from './db/index.js';
import type { PasswordHasher } from './services/passwordHasher.js';
import { SessionGate } from './services/sessionGate.js';
import { AuthService } from './services/authService.js';
import { InventoryService } from './services/inventoryService.js';
import { attachSession } from './middleware/session.js';
import { errorHandler } from './middleware/errorHandler.js';
import { requestLogger } from './utils/logger.js';
import { jsonViewRenderer } from './views/renderer.js';
import type { ViewRenderer } from './views/renderer.js';
import { createAuthRouter } from './routes/auth.js';
import { createInventoryRouter } from './routes/inventory.js';
import { createNotesRouter } from './routes/notes.js';
import { createHealthRouter } from './routes/health.js';

export interface AppDeps {
    store: InventoryStore;
    config: Pick<AppConfig, 'session'>;
    hasher: PasswordHasher;
    renderer?: ViewRenderer;
    clock?: () => Date;
}

export interface AppContext {
    app: Express;
    gate: SessionGate;
    auth: AuthService;
    inventory: InventoryService;
}

export function createApp(deps: AppDeps): AppContext {
    const { store, config, hasher } = deps;
    const renderer = deps.renderer ?? jsonViewRenderer;

    const gate = new SessionGate({ secret: config.session.secret, ttlSeconds: config.session.ttlSeconds });
    const auth = new AuthService({ store, hasher, gate });
    const inventory = new InventoryService({ store, clock: deps.clock });
    const cookie = { secure: config.session.secureCookie, ttlSeconds: config.session.ttlSeconds };

    const app = express();
    app.disable('x-powered-by');

    app.use(requestLogger());
    app.use(express.urlencoded({ extended: false }));
    app.use(express.json());
    app.use(cookieParser());
    app.use(attachSession(gate));

    app.use(createHealthRouter(store));
    app.use(createAuthRouter({ auth, renderer, cookie }));
    app.use(createInventoryRouter({ inventory, renderer }));
    app.use(createNotesRouter({ inventory, renderer }));

    app.use((req: Request, res: Response) => {
        res.status(404).json({ error: `Cannot ${req.method} ${req.path}`, type: 'NotFoundError' });
    });

    // Error handler must be last
    app.use(errorHandler);

    return { app, gate, auth, inventory };
}
