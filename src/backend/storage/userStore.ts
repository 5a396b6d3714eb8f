/**
 * User Store
 *
 * Persists registered accounts in the `users` table.
 * Users are created once at registration and never updated or deleted.
 */

import { v4 as uuidv4 } from 'uuid';
import { User } from '../../shared/types';
import { SqliteDatabase } from './database';
import { StorageError, StorageErrorCode, isUniqueConstraintError } from './errors';

/**
 * Row shape of the `users` table.
 */
interface UserRow {
    id: string;
    username: string;
    password_hash: string;
    created_at: number;
}

/**
 * Interface for account persistence.
 */
export interface IUserStore {
    createUser(username: string, passwordHash: string): Promise<User>;
    findById(id: string): Promise<User | null>;
    findByUsername(username: string): Promise<User | null>;
    countUsers(): Promise<number>;
}

export class UserStore implements IUserStore {
    constructor(private readonly db: SqliteDatabase) {}

    /**
     * Inserts a new user.
     *
     * @param username - Unique username
     * @param passwordHash - Already-derived password hash
     * @throws StorageError with USERNAME_TAKEN if the username exists
     */
    async createUser(username: string, passwordHash: string): Promise<User> {
        const user: User = {
            id: uuidv4(),
            username,
            passwordHash,
            createdAt: new Date(),
        };

        try {
            this.db
                .prepare<[string, string, string, number]>(
                    'INSERT INTO users (id, username, password_hash, created_at) VALUES (?, ?, ?, ?)'
                )
                .run(user.id, user.username, user.passwordHash, user.createdAt.getTime());
        } catch (error) {
            if (isUniqueConstraintError(error)) {
                throw new StorageError(
                    `Username already exists: ${username}`,
                    StorageErrorCode.USERNAME_TAKEN,
                    error
                );
            }
            throw new StorageError(
                'Failed to create user',
                StorageErrorCode.UNKNOWN,
                error
            );
        }

        return user;
    }

    async findById(id: string): Promise<User | null> {
        const row = this.db
            .prepare<[string], UserRow>('SELECT id, username, password_hash, created_at FROM users WHERE id = ?')
            .get(id);
        return row ? this.toUser(row) : null;
    }

    /**
     * Exact, case-sensitive username lookup.
     */
    async findByUsername(username: string): Promise<User | null> {
        const row = this.db
            .prepare<[string], UserRow>('SELECT id, username, password_hash, created_at FROM users WHERE username = ?')
            .get(username);
        return row ? this.toUser(row) : null;
    }

    async countUsers(): Promise<number> {
        const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM users').get();
        return row?.count ?? 0;
    }

    private toUser(row: UserRow): User {
        return {
            id: row.id,
            username: row.username,
            passwordHash: row.password_hash,
            createdAt: new Date(row.created_at),
        };
    }
}

export function createUserStore(db: SqliteDatabase): UserStore {
    return new UserStore(db);
}
