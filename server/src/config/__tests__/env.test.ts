import { EnvValidationError, parseEnv } from '../env.js';

describe('parseEnv', () => {
    it('fills in defaults around the session secret', () => {
        expect(parseEnv({ SESSION_SECRET: 'test-secret' })).toEqual({
            nodeEnv: 'development',
            port: 5000,
            databaseUrl: 'sqlite:inventory.db',
            session: { secret: 'test-secret', ttlSeconds: 604800, secureCookie: false },
            bcryptRounds: 10,
            seedUserPassword: 'a',
            logLevel: undefined,
        });
    });

    it('coerces numeric variables and marks production cookies secure', () => {
        const config = parseEnv({
            SESSION_SECRET: 'test-secret',
            NODE_ENV: 'production',
            PORT: '8080',
            DATABASE_URL: 'postgres://localhost:5432/stock',
            SESSION_TTL_SECONDS: '3600',
            BCRYPT_ROUNDS: '12',
            LOG_LEVEL: 'warn',
        });

        expect(config.port).toBe(8080);
        expect(config.databaseUrl).toBe('postgres://localhost:5432/stock');
        expect(config.session).toEqual({ secret: 'test-secret', ttlSeconds: 3600, secureCookie: true });
        expect(config.bcryptRounds).toBe(12);
        expect(config.logLevel).toBe('warn');
    });

    it('requires a session secret', () => {
        const error = captureError(() => parseEnv({}));

        expect(error).toBeInstanceOf(EnvValidationError);
        expect(error.issues).toEqual(['  - SESSION_SECRET: Required']);
        expect(error.message).toBe('Environment validation failed:\n  - SESSION_SECRET: Required');
    });

    it('lists every invalid variable', () => {
        const error = captureError(() =>
            parseEnv({ SESSION_SECRET: 'test-secret', DATABASE_URL: 'mysql://localhost/stock', PORT: 'abc' })
        );

        expect(error.issues).toEqual([
            '  - DATABASE_URL: DATABASE_URL must start with postgres://, postgresql:// or sqlite:',
            '  - PORT: Expected number, received nan',
        ]);
    });

    it('keeps bcrypt rounds in a usable range', () => {
        expect(() => parseEnv({ SESSION_SECRET: 'test-secret', BCRYPT_ROUNDS: '3' })).toThrow(EnvValidationError);
        expect(() => parseEnv({ SESSION_SECRET: 'test-secret', BCRYPT_ROUNDS: '16' })).toThrow(EnvValidationError);
    });
});

function captureError(fn: () => unknown): EnvValidationError {
    try {
        fn();
    } catch (error) {
        if (error instanceof EnvValidationError) return error;
        throw error;
    }
    throw new Error('expected EnvValidationError');
}
