/**
 * Application configuration
 *
 * Reads the process environment once at start-up and turns it into an
 * immutable AppConfig that is passed to everything that needs it.
 * The entry point loads `.env` (dotenv) before calling loadConfig().
 */

import { randomBytes } from 'crypto';
import { z } from 'zod';
import { CompletionClientConfig, DEFAULT_COMPLETION_CONFIG } from './clients/completionClient';

/**
 * Fully resolved configuration.
 */
export interface AppConfig {
    /** Port the HTTP server listens on */
    port: number;
    /** Secret used to sign session tokens and flash cookies */
    secretKey: string;
    /** Filesystem path (or ":memory:") of the SQLite database */
    databasePath: string;
    /** Lifetime of a session token in seconds */
    sessionTtlSeconds: number;
    /** Whether cookies carry the Secure attribute */
    secureCookies: boolean;
    /** bcrypt cost factor */
    bcryptRounds: number;
    /** Completion service settings */
    completion: CompletionClientConfig;
}

/**
 * Raised when the environment cannot be turned into a valid AppConfig.
 */
export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

const booleanString = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
    XAI_API_KEY: z.string({ required_error: 'XAI_API_KEY environment variable not set' }).min(1, 'XAI_API_KEY environment variable not set'),
    SECRET_KEY: z.string().min(1).optional(),
    DATABASE_URL: z.string().min(1).default('sqlite:///entries.db'),
    PORT: z.coerce.number().int().min(1).max(65535).default(5000),
    XAI_BASE_URL: z.string().url().default(DEFAULT_COMPLETION_CONFIG.baseUrl),
    XAI_MODEL: z.string().min(1).default(DEFAULT_COMPLETION_CONFIG.defaultModel),
    COMPLETION_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_COMPLETION_CONFIG.timeoutMs),
    SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60),
    COOKIE_SECURE: booleanString,
    BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(31).default(10),
});

const SQLITE_URL_PREFIX = 'sqlite:///';

/**
 * Turns a DATABASE_URL into a better-sqlite3 filename.
 *
 * Accepts `sqlite:///<path>` or a bare path. Any other scheme is rejected
 * because only SQLite is supported.
 */
export function resolveDatabasePath(databaseUrl: string): string {
    if (databaseUrl.startsWith(SQLITE_URL_PREFIX)) {
        const filename = databaseUrl.slice(SQLITE_URL_PREFIX.length);
        if (filename.length === 0) {
            throw new ConfigError(`DATABASE_URL has no database path: ${databaseUrl}`);
        }
        return filename;
    }

    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(databaseUrl)) {
        throw new ConfigError(`Unsupported DATABASE_URL scheme (only sqlite is supported): ${databaseUrl}`);
    }

    return databaseUrl;
}

/**
 * Builds the AppConfig from an environment map.
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws ConfigError when a variable is missing or malformed
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);

    if (!parsed.success) {
        const details = parsed.error.issues
            .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid configuration: ${details}`);
    }

    const vars = parsed.data;

    let secretKey = vars.SECRET_KEY;
    if (!secretKey) {
        console.warn('SECRET_KEY not set; generated a random key. Sessions will not survive a restart.');
        secretKey = randomBytes(24).toString('hex');
    }

    return Object.freeze({
        port: vars.PORT,
        secretKey,
        databasePath: resolveDatabasePath(vars.DATABASE_URL),
        sessionTtlSeconds: vars.SESSION_TTL_SECONDS,
        secureCookies: vars.COOKIE_SECURE,
        bcryptRounds: vars.BCRYPT_ROUNDS,
        completion: Object.freeze({
            ...DEFAULT_COMPLETION_CONFIG,
            apiKey: vars.XAI_API_KEY,
            baseUrl: vars.XAI_BASE_URL,
            defaultModel: vars.XAI_MODEL,
            timeoutMs: vars.COMPLETION_TIMEOUT_MS,
        }),
    });
}
