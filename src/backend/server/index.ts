/**
 * Express Server Configuration and Routes
 *
 * This is the HTTP layer of the Support Journal. It serves server-rendered
 * pages (EJS) for:
 * - Registration and login/logout
 * - Listing and creating journal entries
 * and a JSON health check for monitoring.
 *
 * Form submissions follow post/redirect/get: every POST answers with a
 * redirect and carries its outcome to the next page as a flash message.
 * The one exception is a failed login, which re-renders the form directly.
 */

import * as http from 'http';
import * as path from 'path';
import express, { Express, Request, Response, NextFunction } from 'express';
import cookieParser from 'cookie-parser';
import { z } from 'zod';
import { AuthenticatedUser, FlashMessage, HealthResponse } from '../../shared/types';
import {
    CompletionClientConfig,
    ICompletionClient,
    createCompletionClient,
} from '../clients/completionClient';
import {
    ENTRY_MESSAGES,
    INVALID_CREDENTIALS_MESSAGE,
    REGISTRATION_MESSAGES,
    ISupportReplyService,
    createSupportReplyService,
    hashPassword,
    isSafeRedirectTarget,
    validateCredentials,
    validateEntryInput,
    validateRegistration,
    verifyPassword,
} from '../services';
import {
    IEntryStore,
    IUserStore,
    SqliteDatabase,
    StorageError,
    StorageErrorCode,
    createEntryStore,
    createUserStore,
    isDatabaseHealthy,
} from '../storage';
import { flash, flashMiddleware, FlashOptions } from './flash';
import {
    LOGIN_PATH,
    SessionOptions,
    attachIdentity,
    endSession,
    requestHostUrl,
    requireAuth,
    startSession,
} from './session';

/**
 * Server configuration options.
 */
export interface ServerConfig {
    /** Port to listen on */
    port: number;
    /** Signs session tokens and flash cookies */
    secretKey: string;
    /** Open SQLite database */
    database: SqliteDatabase;
    /** Session lifetime in seconds */
    sessionTtlSeconds: number;
    /** Mark cookies Secure (requires HTTPS) */
    secureCookies: boolean;
    /** bcrypt cost factor for new passwords */
    bcryptRounds: number;
    /** Directory holding the EJS views */
    viewsPath: string;
    /** Log one line per request */
    logRequests: boolean;
    /** Completion client settings, used when no client is injected */
    completion?: Partial<CompletionClientConfig>;
    /** User store instance (for dependency injection) */
    userStore?: IUserStore;
    /** Entry store instance (for dependency injection) */
    entryStore?: IEntryStore;
    /** Completion client instance (for dependency injection) */
    completionClient?: ICompletionClient;
    /** Support reply service instance (for dependency injection) */
    supportReplyService?: ISupportReplyService;
}

/**
 * Options accepted by createApp: the secret and the database are required,
 * everything else falls back to DEFAULT_SERVER_CONFIG.
 */
export type ServerOptions = Partial<ServerConfig> & Pick<ServerConfig, 'secretKey' | 'database'>;

/**
 * Default server configuration.
 */
export const DEFAULT_SERVER_CONFIG = {
    port: 5000,
    sessionTtlSeconds: 7 * 24 * 60 * 60,
    secureCookies: false,
    bcryptRounds: 10,
    viewsPath: path.resolve(__dirname, '..', '..', '..', 'views'),
    logRequests: true,
};

export const HOME_PATH = '/';
export const REGISTER_PATH = '/register';

export const SUCCESS_MESSAGES = {
    registered: 'Registration successful! Please log in.',
    loggedOut: 'Logged out successfully.',
    entrySaved: 'Entry saved successfully.',
} as const;

/**
 * Custom error class for HTTP errors raised by handlers.
 * Includes the status code used for the rendered error page.
 */
export class ApiError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number = 500,
        public readonly code?: string
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

/**
 * Largest urlencoded form body accepted. Bodies over the limit are answered
 * like any other invalid form submission.
 */
export const FORM_BODY_LIMIT = '100kb';

/** body-parser error types for a form that was too large to read */
const REJECTED_FORM_TYPES = new Set(['entity.too.large', 'parameters.too.many']);

/**
 * The `type` body-parser sets on the errors it raises.
 */
function bodyParserErrorType(err: unknown): string | undefined {
    if (typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string') {
        return err.type;
    }
    return undefined;
}

/**
 * The 4xx status carried by an http-errors style error, if any.
 */
function clientErrorStatus(err: unknown): number | undefined {
    if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
        return err.status >= 400 && err.status < 500 ? err.status : undefined;
    }
    return undefined;
}

const formBodySchema = z.record(z.unknown());

/**
 * Reads a urlencoded form field as a string.
 * Missing fields and repeated fields (arrays) read as an empty string.
 */
function readField(req: Request, name: string): string {
    const parsed = formBodySchema.safeParse(req.body);
    if (!parsed.success) {
        return '';
    }
    const value = parsed.data[name];
    return typeof value === 'string' ? value : '';
}

/**
 * Returns the authenticated user; only valid behind requireAuth.
 */
function currentUser(req: Request): AuthenticatedUser {
    if (!req.user) {
        throw new ApiError('Authentication required', 401, 'UNAUTHENTICATED');
    }
    return req.user;
}

/**
 * Renders a view with the locals every layout needs.
 */
function renderPage(
    req: Request,
    res: Response,
    view: string,
    locals: Record<string, unknown> = {},
    status: number = 200
): void {
    res.status(status).render(view, {
        currentUser: req.user ?? null,
        flashes: req.flashMessages ?? [],
        ...locals,
    });
}

/**
 * Creates and configures the Express application.
 *
 * Creating the app does not start listening, so tests can drive it in process.
 *
 * @param config - Server configuration options
 * @returns Configured Express application
 */
export function createApp(config: ServerOptions): Express {
    const mergedConfig = { ...DEFAULT_SERVER_CONFIG, ...config };
    const app = express();

    const userStore = mergedConfig.userStore ?? createUserStore(mergedConfig.database);
    const entryStore = mergedConfig.entryStore ?? createEntryStore(mergedConfig.database);
    const completionClient = mergedConfig.completionClient ?? createCompletionClient(mergedConfig.completion);
    const supportReplyService = mergedConfig.supportReplyService ?? createSupportReplyService(completionClient);

    const sessionOptions: SessionOptions = {
        secret: mergedConfig.secretKey,
        ttlSeconds: mergedConfig.sessionTtlSeconds,
        secure: mergedConfig.secureCookies,
    };
    const flashOptions: FlashOptions = { secure: mergedConfig.secureCookies };

    // Message flashed when a form's body is too large to read
    const oversizedFormMessages = new Map<string, string>([
        [HOME_PATH, ENTRY_MESSAGES.tooLong],
        [REGISTER_PATH, REGISTRATION_MESSAGES.tooLong],
        [LOGIN_PATH, INVALID_CREDENTIALS_MESSAGE],
    ]);

    // =========================================================================
    // Middleware Setup
    // =========================================================================

    app.set('views', mergedConfig.viewsPath);
    app.set('view engine', 'ejs');
    app.disable('x-powered-by');

    app.use(cookieParser(mergedConfig.secretKey));
    app.use(express.urlencoded({ extended: false, limit: FORM_BODY_LIMIT }));

    if (mergedConfig.logRequests) {
        app.use((req: Request, _res: Response, next: NextFunction) => {
            console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
            next();
        });
    }

    app.use(flashMiddleware(flashOptions));
    app.use(attachIdentity(userStore, sessionOptions));

    // =========================================================================
    // Health Endpoint
    // =========================================================================

    /**
     * GET /api/health
     *
     * 200 when the database answers, 503 otherwise.
     */
    app.get('/api/health', (_req: Request, res: Response) => {
        const databaseHealthy = isDatabaseHealthy(mergedConfig.database);

        const response: HealthResponse = {
            status: databaseHealthy ? 'ok' : 'error',
            database: databaseHealthy,
        };

        res.status(databaseHealthy ? 200 : 503).json(response);
    });

    // =========================================================================
    // Registration
    // =========================================================================

    app.get(REGISTER_PATH, (req: Request, res: Response) => {
        renderPage(req, res, 'register');
    });

    /**
     * POST /register
     *
     * Validates the form, rejects taken usernames, stores the user with a
     * bcrypt hash and sends them to the login page.
     */
    app.post(REGISTER_PATH, async (req: Request, res: Response, next: NextFunction) => {
        try {
            const username = readField(req, 'username');
            const password = readField(req, 'password');

            const validation = validateRegistration(username, password);
            if (!validation.valid) {
                flash(req, res, 'error', validation.error ?? REGISTRATION_MESSAGES.missingFields, flashOptions);
                res.redirect(REGISTER_PATH);
                return;
            }

            if (await userStore.findByUsername(username)) {
                flash(req, res, 'error', REGISTRATION_MESSAGES.usernameTaken, flashOptions);
                res.redirect(REGISTER_PATH);
                return;
            }

            const passwordHash = await hashPassword(password, mergedConfig.bcryptRounds);
            try {
                await userStore.createUser(username, passwordHash);
            } catch (error) {
                // Lost a race with a concurrent registration of the same name
                if (error instanceof StorageError && error.code === StorageErrorCode.USERNAME_TAKEN) {
                    flash(req, res, 'error', REGISTRATION_MESSAGES.usernameTaken, flashOptions);
                    res.redirect(REGISTER_PATH);
                    return;
                }
                throw error;
            }

            flash(req, res, 'success', SUCCESS_MESSAGES.registered, flashOptions);
            res.redirect(LOGIN_PATH);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Login / Logout
    // =========================================================================

    app.get(LOGIN_PATH, (req: Request, res: Response) => {
        const nextTarget = typeof req.query.next === 'string' ? req.query.next : '';
        renderPage(req, res, 'login', { next: nextTarget });
    });

    /**
     * POST /login
     *
     * Missing fields, an unknown username and a wrong password all produce
     * the same message. On success the session cookie is set and the client
     * is sent to `next` when it is same-origin, otherwise home.
     */
    app.post(LOGIN_PATH, async (req: Request, res: Response, next: NextFunction) => {
        try {
            const username = readField(req, 'username');
            const password = readField(req, 'password');
            const nextTarget = typeof req.query.next === 'string' ? req.query.next : '';

            const user = validateCredentials(username, password).valid
                ? await userStore.findByUsername(username)
                : null;

            if (user && (await verifyPassword(password, user.passwordHash))) {
                startSession(res, { id: user.id, username: user.username }, sessionOptions);

                if (nextTarget && isSafeRedirectTarget(nextTarget, requestHostUrl(req))) {
                    res.redirect(nextTarget);
                    return;
                }
                res.redirect(HOME_PATH);
                return;
            }

            const failure: FlashMessage = { category: 'error', message: INVALID_CREDENTIALS_MESSAGE };
            req.flashMessages = [...(req.flashMessages ?? []), failure];
            renderPage(req, res, 'login', { next: nextTarget });
        } catch (error) {
            next(error);
        }
    });

    /**
     * GET /logout
     */
    app.get('/logout', requireAuth, (req: Request, res: Response) => {
        endSession(res, sessionOptions);
        flash(req, res, 'success', SUCCESS_MESSAGES.loggedOut, flashOptions);
        res.redirect(LOGIN_PATH);
    });

    // =========================================================================
    // Entries
    // =========================================================================

    /**
     * GET /
     *
     * The current user's entries, newest first.
     */
    app.get(HOME_PATH, requireAuth, async (req: Request, res: Response, next: NextFunction) => {
        try {
            const user = currentUser(req);
            const entries = await entryStore.listEntriesForUser(user.id);
            renderPage(req, res, 'index', { entries });
        } catch (error) {
            next(error);
        }
    });

    /**
     * POST /
     *
     * Validates the form, asks the completion service for a reply (the
     * fallback reply if that fails) and stores the entry.
     */
    app.post(HOME_PATH, requireAuth, async (req: Request, res: Response, next: NextFunction) => {
        try {
            const user = currentUser(req);
            const category = readField(req, 'category');
            const description = readField(req, 'description');

            const validation = validateEntryInput(category, description);
            if (!validation.valid) {
                flash(req, res, 'error', validation.error ?? ENTRY_MESSAGES.missingFields, flashOptions);
                res.redirect(HOME_PATH);
                return;
            }

            const reply = await supportReplyService.getReply(category, description);
            await entryStore.createEntry({
                userId: user.id,
                category,
                description,
                response: reply,
            });

            flash(req, res, 'success', SUCCESS_MESSAGES.entrySaved, flashOptions);
            res.redirect(HOME_PATH);
        } catch (error) {
            next(error);
        }
    });

    // =========================================================================
    // Error Handling
    // =========================================================================

    app.use((req: Request, res: Response) => {
        renderPage(req, res, 'error', { statusCode: 404, message: 'Page not found' }, 404);
    });

    /**
     * Global error handler.
     *
     * A form body too large to read goes back to its form with a flash
     * message, like any other invalid submission. ApiErrors and other 4xx
     * errors render with their own status; anything else is logged and shown
     * as a generic 500 page.
     */
    app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
        if (res.headersSent) {
            next(err);
            return;
        }

        const rejectedFormMessage = req.method === 'POST' ? oversizedFormMessages.get(req.path) : undefined;
        const bodyErrorType = bodyParserErrorType(err);
        if (rejectedFormMessage && bodyErrorType && REJECTED_FORM_TYPES.has(bodyErrorType)) {
            flash(req, res, 'error', rejectedFormMessage, flashOptions);
            res.redirect(req.originalUrl);
            return;
        }

        if (err instanceof ApiError) {
            renderPage(req, res, 'error', { statusCode: err.statusCode, message: err.message }, err.statusCode);
            return;
        }

        const status = clientErrorStatus(err);
        if (status !== undefined) {
            renderPage(req, res, 'error', { statusCode: status, message: err.message }, status);
            return;
        }

        console.error('Unhandled error:', err);
        renderPage(req, res, 'error', { statusCode: 500, message: 'Internal server error' }, 500);
    });

    return app;
}

/**
 * Starts the Express server.
 *
 * @param app - The Express application to start
 * @param port - Port to listen on
 * @returns The listening HTTP server
 */
export function startServer(
    app: Express,
    port: number = DEFAULT_SERVER_CONFIG.port
): Promise<http.Server> {
    return new Promise((resolve, reject) => {
        const server = app.listen(port, () => {
            console.log(`Support Journal server running on port ${port}`);
            console.log(`Health check: http://localhost:${port}/api/health`);
            resolve(server);
        });
        server.on('error', reject);
    });
}

/**
 * Factory function to create and optionally start the server.
 *
 * @param config - Server configuration
 * @param autoStart - Whether to start the server immediately
 * @returns The Express app and, when started, its HTTP server
 */
export async function createServer(
    config: ServerOptions,
    autoStart: boolean = false
): Promise<{ app: Express; server?: http.Server }> {
    const app = createApp(config);

    if (autoStart) {
        const server = await startServer(app, config.port ?? DEFAULT_SERVER_CONFIG.port);
        return { app, server };
    }

    return { app };
}
