/**
 * Flash messages
 *
 * A flash message survives exactly one redirect: it is written to a signed
 * cookie, read back on the next request, and the cookie is cleared as soon as
 * it has been read. Messages read from the cookie are exposed on
 * `req.flashMessages` for the page rendered by that request.
 */

import { Request, Response, RequestHandler, CookieOptions } from 'express';
import { z } from 'zod';
import { FlashCategory, FlashMessage } from '../../shared/types';

export const FLASH_COOKIE = 'flash';

declare global {
    namespace Express {
        interface Request {
            /** Flash messages to display on the page rendered for this request */
            flashMessages?: FlashMessage[];
        }
    }
}

const flashCookieSchema = z.array(
    z.object({
        category: z.enum(['error', 'success']),
        message: z.string(),
    })
);

export interface FlashOptions {
    /** Mark the flash cookie Secure */
    secure: boolean;
}

function flashCookieOptions(options: FlashOptions): CookieOptions {
    return {
        httpOnly: true,
        sameSite: 'lax',
        secure: options.secure,
        signed: true,
        path: '/',
    };
}

/**
 * Decodes the flash cookie value.
 * cookie-parser yields `false` for a bad signature; that, like any value that
 * is not a JSON list of messages, decodes to no messages.
 */
export function parseFlashCookie(raw: unknown): FlashMessage[] {
    if (typeof raw !== 'string') {
        return [];
    }

    let decoded: unknown;
    try {
        decoded = JSON.parse(raw);
    } catch {
        return [];
    }

    const parsed = flashCookieSchema.safeParse(decoded);
    return parsed.success ? parsed.data : [];
}

/**
 * Moves messages from the flash cookie onto the request and clears the cookie.
 * Must run after cookie-parser.
 */
export function flashMiddleware(options: FlashOptions): RequestHandler {
    return (req, res, next) => {
        const raw: unknown = req.signedCookies[FLASH_COOKIE];
        req.flashMessages = parseFlashCookie(raw);

        if (raw !== undefined) {
            res.clearCookie(FLASH_COOKIE, { path: '/' });
        }

        next();
    };
}

/**
 * Queues a message for the page rendered after the next redirect.
 * Messages from the current request that were never rendered are carried along.
 */
export function flash(
    req: Request,
    res: Response,
    category: FlashCategory,
    message: string,
    options: FlashOptions
): void {
    const pending = [...(req.flashMessages ?? []), { category, message }];
    req.flashMessages = pending;
    res.cookie(FLASH_COOKIE, JSON.stringify(pending), flashCookieOptions(options));
}
