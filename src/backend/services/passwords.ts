/**
 * Password hashing
 *
 * bcrypt embeds a per-hash random salt and its cost factor in the hash
 * string, so verification needs only the stored hash.
 */

import bcrypt from 'bcryptjs';

export const DEFAULT_BCRYPT_ROUNDS = 10;

export async function hashPassword(password: string, rounds: number = DEFAULT_BCRYPT_ROUNDS): Promise<string> {
    return bcrypt.hash(password, rounds);
}

/**
 * Returns true if `password` matches `passwordHash`.
 * A malformed hash counts as a mismatch.
 */
export async function verifyPassword(password: string, passwordHash: string): Promise<boolean> {
    try {
        return await bcrypt.compare(password, passwordHash);
    } catch (error) {
        console.error('Stored password hash could not be checked:', error);
        return false;
    }
}
