import jwt from 'jsonwebtoken';
import { ANONYMOUS, SessionGate, authenticatedAs, isAuthenticated } from '../sessionGate.js';
import { TEST_SESSION_SECRET } from '../../__tests__/fixtures.js';

describe('SessionGate', () => {
    const gate = new SessionGate({ secret: TEST_SESSION_SECRET, ttlSeconds: 60 });

    afterEach(() => {
        vi.useRealTimers();
    });

    it('resolves a token it opened to the same username', () => {
        const token = gate.open('max');
        expect(gate.resolve(token)).toEqual({ status: 'authenticated', username: 'max' });
    });

    it('treats a missing token as anonymous', () => {
        expect(gate.resolve(undefined)).toBe(ANONYMOUS);
        expect(gate.resolve('')).toBe(ANONYMOUS);
    });

    it('treats garbage as anonymous', () => {
        expect(gate.resolve('not-a-token')).toBe(ANONYMOUS);
    });

    it('rejects a token signed with another secret', () => {
        const other = new SessionGate({ secret: 'other-secret', ttlSeconds: 60 });
        expect(gate.resolve(other.open('max'))).toBe(ANONYMOUS);
    });

    it('rejects an expired token', () => {
        vi.useFakeTimers();
        vi.setSystemTime(new Date('2026-10-19T12:00:00Z'));
        const token = gate.open('max');

        vi.setSystemTime(new Date('2026-10-19T12:01:01Z'));
        expect(gate.resolve(token)).toBe(ANONYMOUS);
    });

    it('rejects a validly signed token without a subject', () => {
        const token = jwt.sign({ role: 'admin' }, TEST_SESSION_SECRET, { algorithm: 'HS256' });
        expect(gate.resolve(token)).toBe(ANONYMOUS);
    });

    it('refuses to start without a secret', () => {
        expect(() => new SessionGate({ secret: '', ttlSeconds: 60 })).toThrow('Session secret is required');
    });
});

describe('session states', () => {
    it('narrows on status', () => {
        expect(isAuthenticated(authenticatedAs('max'))).toBe(true);
        expect(isAuthenticated(ANONYMOUS)).toBe(false);
    });
});
