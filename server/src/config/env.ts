/**
 * Environment Variable Validation
 *
 * Validates the environment once at startup using Zod and turns it into an
 * AppConfig that is passed explicitly to the store, the session gate and the
 * services. Nothing else reads process.env.
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Map it onto AppConfig in toAppConfig()
 */

import { z } from 'zod';
import { DEFAULT_REFERENCE_PASSWORD } from '@stockroom/shared';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z.object({
    // ----------------------------------------
    // REQUIRED - App will not start without these
    // ----------------------------------------

    /** Secret key for signing session tokens */
    SESSION_SECRET: z.string().min(1, 'SESSION_SECRET is required'),

    // ----------------------------------------
    // OPTIONAL - With sensible defaults
    // ----------------------------------------

    /** Store location: postgres://..., postgresql://... or sqlite:<path> (sqlite::memory: for a throwaway store) */
    DATABASE_URL: z
        .string()
        .regex(/^(postgres(ql)?:\/\/|sqlite:)/, 'DATABASE_URL must start with postgres://, postgresql:// or sqlite:')
        .default('sqlite:inventory.db'),

    /** Environment mode */
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    /** Server port */
    PORT: z.coerce.number().int().positive().default(5000),

    /** Session lifetime in seconds (default 7 days) */
    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),

    /** bcrypt cost factor for the seeded user's password hash */
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),

    /** Password given to the reference user when it is first seeded */
    SEED_USER_PASSWORD: z.string().min(1).default(DEFAULT_REFERENCE_PASSWORD),

    /** Override the pino log level */
    LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),
});

// ============================================
// TYPE EXPORTS
// ============================================

export type Env = z.infer<typeof envSchema>;

export type NodeEnv = Env['NODE_ENV'];

export interface AppConfig {
    nodeEnv: NodeEnv;
    port: number;
    databaseUrl: string;
    session: {
        secret: string;
        ttlSeconds: number;
        /** Send the cookie over HTTPS only */
        secureCookie: boolean;
    };
    bcryptRounds: number;
    seedUserPassword: string;
    logLevel?: Env['LOG_LEVEL'];
}

// ============================================
// PARSE AND VALIDATE
// ============================================

export class EnvValidationError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super('Environment validation failed:\n' + issues.join('\n'));
        this.name = 'EnvValidationError';
        this.issues = issues;
    }
}

function toAppConfig(env: Env): AppConfig {
    return {
        nodeEnv: env.NODE_ENV,
        port: env.PORT,
        databaseUrl: env.DATABASE_URL,
        session: {
            secret: env.SESSION_SECRET,
            ttlSeconds: env.SESSION_TTL_SECONDS,
            secureCookie: env.NODE_ENV === 'production',
        },
        bcryptRounds: env.BCRYPT_ROUNDS,
        seedUserPassword: env.SEED_USER_PASSWORD,
        logLevel: env.LOG_LEVEL,
    };
}

/**
 * Validate an environment object and build the app config.
 *
 * @throws EnvValidationError listing every failing variable
 */
export function parseEnv(source: Record<string, string | undefined>): AppConfig {
    const result = envSchema.safeParse(source);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => {
            const path = issue.path.join('.');
            return `  - ${path}: ${issue.message}`;
        });
        throw new EnvValidationError(issues);
    }
    return toAppConfig(result.data);
}

/**
 * Validate process.env and exit on failure.
 * Only entry points call this, after `dotenv/config` has loaded `.env`.
 */
export function loadConfig(): AppConfig {
    try {
        return parseEnv(process.env);
    } catch (error) {
        if (error instanceof EnvValidationError) {
            console.error(error.message);
            process.exit(1);
        }
        throw error;
    }
}
