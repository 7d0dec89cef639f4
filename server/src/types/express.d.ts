// src/types/express.d.ts
import type { SessionState } from '../services/sessionGate.js';

declare global {
    namespace Express {
        interface Request {
            /** Set for every request by attachSession() */
            sessionState: SessionState;
        }
    }
}

export {};
