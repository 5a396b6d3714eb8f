/**
 * Session tokens
 *
 * The identity of a logged-in user is a signed JWT carried in a cookie.
 * Nothing is stored server-side: a token is valid while its signature checks
 * out and it has not expired.
 */

import jwt, { JwtPayload } from 'jsonwebtoken';
import { AuthenticatedUser } from '../../shared/types';

export interface SessionTokenOptions {
    /** HMAC secret */
    secret: string;
    /** Token lifetime in seconds */
    ttlSeconds: number;
}

/**
 * Signs a token identifying `user`.
 */
export function signSessionToken(user: AuthenticatedUser, options: SessionTokenOptions): string {
    return jwt.sign({ username: user.username }, options.secret, {
        subject: user.id,
        expiresIn: options.ttlSeconds,
        algorithm: 'HS256',
    });
}

/**
 * Verifies a token and returns the identity it names.
 *
 * @returns The identity, or null for a malformed, tampered or expired token
 */
export function verifySessionToken(token: string, secret: string): AuthenticatedUser | null {
    let decoded: string | JwtPayload;
    try {
        decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
    } catch {
        return null;
    }

    if (typeof decoded === 'string') {
        return null;
    }

    const { sub, username } = decoded;
    if (typeof sub !== 'string' || typeof username !== 'string') {
        return null;
    }

    return { id: sub, username };
}
