import pino from 'pino';
import { ShutdownCoordinator } from '../shutdownCoordinator.js';

describe('ShutdownCoordinator', () => {
    let coordinator: ShutdownCoordinator;

    beforeEach(() => {
        coordinator = new ShutdownCoordinator(pino({ level: 'silent' }));
    });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('runs every registered handler once', async () => {
        const http = vi.fn();
        const store = vi.fn(async () => undefined);
        coordinator.register('http', http);
        coordinator.register('store', store);

        const results = await coordinator.shutdown();

        expect(http).toHaveBeenCalledTimes(1);
        expect(store).toHaveBeenCalledTimes(1);
        expect(results.map((r) => [r.name, r.success])).toEqual([
            ['http', true],
            ['store', true],
        ]);
    });

    it('reports a failing handler without stopping the others', async () => {
        const store = vi.fn();
        coordinator.register('http', () => {
            throw new Error('already closed');
        });
        coordinator.register('store', store);

        const results = await coordinator.shutdown();

        expect(results[0]).toMatchObject({ name: 'http', success: false, error: 'already closed' });
        expect(results[1]).toMatchObject({ name: 'store', success: true });
        expect(store).toHaveBeenCalledTimes(1);
    });

    it('gives up on a handler that outlives its timeout', async () => {
        vi.useFakeTimers();
        coordinator.register('stuck', () => new Promise<void>(() => undefined), { timeout: 50 });

        const pending = coordinator.shutdown();
        await vi.advanceTimersByTimeAsync(50);

        await expect(pending).resolves.toEqual([
            expect.objectContaining({ name: 'stuck', success: false, error: 'Timeout' }),
        ]);
    });

    it('starts a later phase only after the earlier one has finished', async () => {
        const events: string[] = [];
        coordinator.register(
            'store',
            () => {
                events.push('store');
            },
            { phase: 1 }
        );
        coordinator.register('http', async () => {
            await new Promise((resolve) => setTimeout(resolve, 20));
            events.push('http');
        });

        const results = await coordinator.shutdown();

        expect(events).toEqual(['http', 'store']);
        expect(results.map((r) => r.name)).toEqual(['http', 'store']);
    });

    it('runs later phases even when an earlier handler fails', async () => {
        const store = vi.fn();
        coordinator.register('http', () => {
            throw new Error('already closed');
        });
        coordinator.register('store', store, { phase: 1 });

        await coordinator.shutdown();

        expect(store).toHaveBeenCalledTimes(1);
    });

    it('replaces a handler registered twice under one name', async () => {
        const first = vi.fn();
        const second = vi.fn();
        coordinator.register('store', first);
        coordinator.register('store', second);

        await coordinator.shutdown();

        expect(first).not.toHaveBeenCalled();
        expect(second).toHaveBeenCalledTimes(1);
    });

    it('ignores a second shutdown request', async () => {
        const handler = vi.fn();
        coordinator.register('store', handler);

        const first = coordinator.shutdown();
        expect(coordinator.isInProgress()).toBe(true);
        await expect(coordinator.shutdown()).resolves.toEqual([]);
        await first;

        expect(handler).toHaveBeenCalledTimes(1);
    });
});
