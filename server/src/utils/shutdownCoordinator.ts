/**
 * Shutdown Coordinator
 *
 * Runs registered cleanup handlers (HTTP server, database pool) when the process
 * is asked to stop. Each handler gets its own timeout so one stuck handler cannot
 * hold up the rest.
 *
 * Handlers run in phases, lowest first; handlers within a phase run in parallel.
 * The HTTP listener drains in phase 0 before the store closes in phase 1, so a
 * request in flight at SIGTERM still has its store.
 */

import type { Server } from 'node:http';
import type { Logger } from 'pino';
import { serverLogger } from './logger.js';

// ============================================
// TYPE DEFINITIONS
// ============================================

interface ShutdownHandler {
    name: string;
    handler: () => Promise<void> | void;
    timeout: number;
    phase: number;
}

export interface ShutdownHandlerOptions {
    /** Max time to wait for the handler (ms), default 10s */
    timeout?: number;
    /** Later phases start once every handler of earlier phases has settled, default 0 */
    phase?: number;
}

export interface ShutdownResult {
    name: string;
    success: boolean;
    error?: string;
    duration: number;
}

// ============================================
// SHUTDOWN COORDINATOR CLASS
// ============================================

export class ShutdownCoordinator {
    private readonly handlers = new Map<string, ShutdownHandler>();
    private isShuttingDown = false;

    constructor(private readonly log: Logger = serverLogger) {}

    /**
     * Register a shutdown handler
     * @param name - Unique identifier for the handler
     * @param handler - Function to call on shutdown
     */
    register(name: string, handler: () => Promise<void> | void, options: ShutdownHandlerOptions = {}): void {
        if (this.handlers.has(name)) {
            this.log.warn({ name }, 'Shutdown handler already registered, replacing');
        }
        const { timeout = 10000, phase = 0 } = options;
        this.handlers.set(name, { name, handler, timeout, phase });
    }

    isInProgress(): boolean {
        return this.isShuttingDown;
    }

    /**
     * Execute the shutdown handlers phase by phase, each bounded by its timeout.
     * A failed or timed-out handler does not stop later phases.
     * A second call while the first is running does nothing.
     */
    async shutdown(): Promise<ShutdownResult[]> {
        if (this.isShuttingDown) {
            this.log.warn('Shutdown already in progress');
            return [];
        }

        this.isShuttingDown = true;
        this.log.info({ handlerCount: this.handlers.size }, 'Starting graceful shutdown');

        const phases = [...new Set(Array.from(this.handlers.values(), (entry) => entry.phase))].sort((a, b) => a - b);
        const results: ShutdownResult[] = [];
        for (const phase of phases) {
            const entries = Array.from(this.handlers.values()).filter((entry) => entry.phase === phase);
            results.push(...(await Promise.all(entries.map((entry) => this.runHandler(entry)))));
        }

        const successful = results.filter((r) => r.success).length;
        this.log.info({ successful, failed: results.length - successful, total: results.length }, 'Shutdown complete');
        return results;
    }

    private async runHandler({ name, handler, timeout }: ShutdownHandler): Promise<ShutdownResult> {
        const start = Date.now();
        let timer: NodeJS.Timeout | undefined;

        try {
            const timedOut = await Promise.race([
                Promise.resolve(handler()).then(() => false),
                new Promise<boolean>((resolve) => {
                    timer = setTimeout(() => resolve(true), timeout);
                }),
            ]);
            const duration = Date.now() - start;

            if (timedOut) {
                this.log.warn({ name, timeout, duration }, 'Shutdown handler timed out');
                return { name, success: false, error: 'Timeout', duration };
            }
            return { name, success: true, duration };
        } catch (error: unknown) {
            const duration = Date.now() - start;
            const errorMsg = error instanceof Error ? error.message : 'Unknown error';
            this.log.error({ name, error: errorMsg, duration }, 'Shutdown handler failed');
            return { name, success: false, error: errorMsg, duration };
        } finally {
            clearTimeout(timer);
        }
    }
}

// ============================================
// SERVER WIRING
// ============================================

export interface Closable {
    close(): Promise<void>;
}

/**
 * Stop accepting connections and wait for in-flight requests, then close the store.
 */
export function registerServerShutdown(coordinator: ShutdownCoordinator, server: Server, store: Closable): void {
    coordinator.register(
        'http',
        () =>
            new Promise<void>((resolve, reject) => {
                server.close((err) => (err ? reject(err) : resolve()));
            }),
        { phase: 0 }
    );
    coordinator.register('store', () => store.close(), { phase: 1 });
}

export const shutdownCoordinator = new ShutdownCoordinator();
export default shutdownCoordinator;
