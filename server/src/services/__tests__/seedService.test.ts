/**
 * Reference data seeding: idempotency and per-record failure handling
 */

import { seedReferenceData } from '../seedService.js';
import type { PasswordHasher } from '../passwordHasher.js';
import { KyselyInventoryRepository } from '../../db/index.js';
import type { KyselyInventoryStore } from '../../db/index.js';
import { ConstraintViolationError } from '../../utils/errors.js';
import { createFakeHasher, createTestStore } from '../../__tests__/fixtures.js';

describe('seedReferenceData', () => {
    let store: KyselyInventoryStore;
    let hasher: PasswordHasher;

    const counts = () =>
        store.read(async (repo) => ({
            locations: (await repo.listLocations()).length,
            users: (await repo.listUsers()).length,
            stock: (await repo.listStock()).length,
        }));

    beforeEach(async () => {
        store = await createTestStore();
        hasher = createFakeHasher();
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await store.close();
    });

    it('creates every reference record on an empty store', async () => {
        const report = await seedReferenceData({ store, hasher });

        expect(report).toEqual({
            created: ['location:TPA', 'location:CLW', 'user:max', 'stock:1137', 'stock:1138'],
            skipped: [],
            failed: [],
        });
    });

    it('places reference stock in its office location', async () => {
        await seedReferenceData({ store, hasher });

        const stock = await store.read((repo) => repo.listStock());
        const tpa = await store.read((repo) => repo.findLocationByOffice('TPA'));
        const clw = await store.read((repo) => repo.findLocationByOffice('CLW'));

        expect(stock).toEqual([
            { id: 1, serial: '1137', mfg: 'sbp', dimen: '25x50', type: 'win', modifier: '1', locationId: tpa?.id },
            { id: 2, serial: '1138', mfg: 'pgt', dimen: '10x10', type: 'win', modifier: '1', locationId: clw?.id },
        ]);
    });

    it('stores the hashed default password', async () => {
        await seedReferenceData({ store, hasher });

        const user = await store.read((repo) => repo.findUserByUsername('max'));
        expect(user?.passwordHash).toBe('hashed:a');
    });

    it('uses a configured password instead of the default', async () => {
        await seedReferenceData({ store, hasher, password: 'changed' });

        const user = await store.read((repo) => repo.findUserByUsername('max'));
        expect(user?.passwordHash).toBe('hashed:changed');
    });

    it('skips everything on later runs', async () => {
        await seedReferenceData({ store, hasher });
        await seedReferenceData({ store, hasher });
        const third = await seedReferenceData({ store, hasher });

        expect(third.created).toEqual([]);
        expect(third.failed).toEqual([]);
        expect(third.skipped).toEqual(['location:TPA', 'location:CLW', 'user:max', 'stock:1137', 'stock:1138']);
        await expect(counts()).resolves.toEqual({ locations: 2, users: 1, stock: 2 });
    });

    it('leaves one copy of each record when runs overlap', async () => {
        await Promise.all([
            seedReferenceData({ store, hasher }),
            seedReferenceData({ store, hasher }),
            seedReferenceData({ store, hasher }),
        ]);

        await expect(counts()).resolves.toEqual({ locations: 2, users: 1, stock: 2 });
    });

    it('records a commit rejected by a unique constraint and carries on', async () => {
        await seedReferenceData({ store, hasher });

        // Another initializer inserted the user between our lookup and insert
        vi.spyOn(KyselyInventoryRepository.prototype, 'findUserByUsername').mockResolvedValueOnce(undefined);

        const report = await seedReferenceData({ store, hasher });

        expect(report.failed).toEqual(['user:max']);
        expect(report.skipped).toEqual(['location:TPA', 'location:CLW', 'stock:1137', 'stock:1138']);
        await expect(counts()).resolves.toEqual({ locations: 2, users: 1, stock: 2 });
    });

    it('reports a location whose lookup lost the race to another initializer', async () => {
        await seedReferenceData({ store, hasher });

        vi.spyOn(KyselyInventoryRepository.prototype, 'findLocationByOffice').mockResolvedValueOnce(undefined);

        const report = await seedReferenceData({ store, hasher });

        expect(report.failed).toEqual(['location:TPA']);
        expect(report.skipped).toEqual(['location:CLW', 'user:max', 'stock:1137', 'stock:1138']);
        await expect(counts()).resolves.toEqual({ locations: 2, users: 1, stock: 2 });
    });

    it('seeds stock unplaced when its reference location could not be created', async () => {
        const insertLocation = vi
            .spyOn(KyselyInventoryRepository.prototype, 'insertLocation')
            .mockRejectedValue(new ConstraintViolationError('location rejected', 'other'));

        const report = await seedReferenceData({ store, hasher });
        insertLocation.mockRestore();

        expect(report.failed).toEqual(['location:TPA', 'location:CLW']);
        expect(report.created).toEqual(['user:max', 'stock:1137', 'stock:1138']);

        const stock = await store.read((repo) => repo.listStock());
        expect(stock.map((item) => item.locationId)).toEqual([null, null]);
    });

    it('propagates errors that are not constraint violations', async () => {
        vi.spyOn(KyselyInventoryRepository.prototype, 'findStockBySerial').mockRejectedValue(new Error('disk gone'));

        await expect(seedReferenceData({ store, hasher })).rejects.toThrow('disk gone');
    });
});
