import express from 'express';
import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import { errorHandler } from '../errorHandler.js';
import { asyncHandler } from '../asyncHandler.js';
import { DatabaseError } from '../../utils/errors.js';

describe('errorHandler', () => {
    let server: Server;
    let baseUrl: string;

    beforeAll(async () => {
        const app = express();
        app.get(
            '/database',
            asyncHandler(async () => {
                throw new DatabaseError('connection lost', new Error('ECONNRESET'));
            })
        );
        app.get('/teapot', () => {
            throw Object.assign(new Error('short and stout'), { status: 418 });
        });
        app.get('/crash', () => {
            throw new Error('secret internals');
        });
        app.use(errorHandler);

        server = await new Promise<Server>((resolve) => {
            const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
        });
        const address: AddressInfo | string | null = server.address();
        if (!address || typeof address === 'string') throw new Error('server has no port');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        server.closeAllConnections();
        await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    });

    const get = async (path: string) => {
        const response = await fetch(`${baseUrl}${path}`);
        return { status: response.status, body: await response.json() };
    };

    it('hides database details outside development', async () => {
        await expect(get('/database')).resolves.toEqual({
            status: 500,
            body: { error: 'Database operation failed', type: 'DatabaseError' },
        });
    });

    it('keeps a status set by the thrower', async () => {
        await expect(get('/teapot')).resolves.toEqual({
            status: 418,
            body: { error: 'short and stout', type: 'Error' },
        });
    });

    it('replaces the message of an unexpected error', async () => {
        await expect(get('/crash')).resolves.toEqual({
            status: 500,
            body: { error: 'Internal server error', type: 'Error' },
        });
    });
});
