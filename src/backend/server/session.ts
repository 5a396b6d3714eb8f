/**
 * Session / Auth gate
 *
 * Maps each request to an authenticated user or leaves it anonymous.
 * The identity lives in a signed, expiring token (see sessionTokens) stored
 * in the `session` cookie. Protected routes send anonymous requests to the
 * login page with a `next` parameter pointing back at where they were going.
 */

import { CookieOptions, Request, RequestHandler, Response } from 'express';
import { AuthenticatedUser } from '../../shared/types';
import { signSessionToken, verifySessionToken } from '../services/sessionTokens';
import { IUserStore } from '../storage/userStore';

export const SESSION_COOKIE = 'session';
export const LOGIN_PATH = '/login';

declare global {
    namespace Express {
        interface Request {
            /** Set by attachIdentity when the session cookie is valid */
            user?: AuthenticatedUser;
        }
    }
}

export interface SessionOptions {
    /** Token signing secret */
    secret: string;
    /** Token and cookie lifetime in seconds */
    ttlSeconds: number;
    /** Mark the session cookie Secure */
    secure: boolean;
}

function sessionCookieOptions(options: SessionOptions): CookieOptions {
    return {
        httpOnly: true,
        sameSite: 'lax',
        secure: options.secure,
        path: '/',
    };
}

/**
 * Resolves the session cookie to a user and stores it on `req.user`.
 *
 * Tokens that fail verification, and tokens naming a user that no longer
 * exists, leave the request anonymous and clear the cookie.
 * Must run after cookie-parser.
 */
export function attachIdentity(userStore: IUserStore, options: SessionOptions): RequestHandler {
    return async (req, res, next) => {
        try {
            const token: unknown = req.cookies[SESSION_COOKIE];
            if (typeof token !== 'string' || token.length === 0) {
                next();
                return;
            }

            const identity = verifySessionToken(token, options.secret);
            const user = identity ? await userStore.findById(identity.id) : null;

            if (user) {
                req.user = { id: user.id, username: user.username };
            } else {
                res.clearCookie(SESSION_COOKIE, sessionCookieOptions(options));
            }

            next();
        } catch (error) {
            next(error);
        }
    };
}

/**
 * Rejects anonymous requests with a redirect to the login page.
 */
export const requireAuth: RequestHandler = (req, res, next) => {
    if (req.user) {
        next();
        return;
    }

    res.redirect(`${LOGIN_PATH}?next=${encodeURIComponent(req.originalUrl)}`);
};

/**
 * Issues a session cookie for `user`.
 */
export function startSession(res: Response, user: AuthenticatedUser, options: SessionOptions): void {
    const token = signSessionToken(user, { secret: options.secret, ttlSeconds: options.ttlSeconds });
    res.cookie(SESSION_COOKIE, token, {
        ...sessionCookieOptions(options),
        maxAge: options.ttlSeconds * 1000,
    });
}

/**
 * Drops the session cookie, making the client anonymous again.
 */
export function endSession(res: Response, options: SessionOptions): void {
    res.clearCookie(SESSION_COOKIE, sessionCookieOptions(options));
}

/**
 * Origin of the current request with a trailing slash, e.g. `http://localhost:5000/`.
 */
export function requestHostUrl(req: Request): string {
    return `${req.protocol}://${req.get('host') ?? ''}/`;
}
