/**
 * Entry Store
 *
 * Persists journal entries in the `entries` table. Every read is scoped to
 * one owner; there is no query that returns another user's entries.
 */

import { v4 as uuidv4 } from 'uuid';
import { Entry, NewEntry } from '../../shared/types';
import { SqliteDatabase } from './database';
import { StorageError, StorageErrorCode, isForeignKeyConstraintError } from './errors';

interface EntryRow {
    id: string;
    user_id: string;
    category: string;
    description: string;
    response: string;
    created_at: number;
}

/**
 * Interface for entry persistence.
 */
export interface IEntryStore {
    createEntry(input: NewEntry): Promise<Entry>;
    listEntriesForUser(userId: string): Promise<Entry[]>;
    countEntriesForUser(userId: string): Promise<number>;
}

export class EntryStore implements IEntryStore {
    constructor(private readonly db: SqliteDatabase) {}

    /**
     * Stores a new entry stamped with the current time.
     * The owner must exist.
     *
     * @throws StorageError with UNKNOWN_OWNER if no user has `input.userId`
     */
    async createEntry(input: NewEntry): Promise<Entry> {
        const entry: Entry = {
            id: uuidv4(),
            userId: input.userId,
            category: input.category,
            description: input.description,
            response: input.response,
            createdAt: new Date(),
        };

        try {
            this.db
                .prepare<[string, string, string, string, string, number]>(
                    `INSERT INTO entries (id, user_id, category, description, response, created_at)
                     VALUES (?, ?, ?, ?, ?, ?)`
                )
                .run(
                    entry.id,
                    entry.userId,
                    entry.category,
                    entry.description,
                    entry.response,
                    entry.createdAt.getTime()
                );
        } catch (error) {
            if (isForeignKeyConstraintError(error)) {
                throw new StorageError(
                    `No user with id ${input.userId}`,
                    StorageErrorCode.UNKNOWN_OWNER,
                    error
                );
            }
            throw new StorageError('Failed to create entry', StorageErrorCode.UNKNOWN, error);
        }

        return entry;
    }

    /**
     * Lists a user's entries, newest first.
     * Entries created in the same millisecond come back latest-inserted first.
     */
    async listEntriesForUser(userId: string): Promise<Entry[]> {
        const rows = this.db
            .prepare<[string], EntryRow>(
                `SELECT id, user_id, category, description, response, created_at
                 FROM entries
                 WHERE user_id = ?
                 ORDER BY created_at DESC, rowid DESC`
            )
            .all(userId);

        return rows.map((row) => this.toEntry(row));
    }

    async countEntriesForUser(userId: string): Promise<number> {
        const row = this.db
            .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM entries WHERE user_id = ?')
            .get(userId);
        return row?.count ?? 0;
    }

    private toEntry(row: EntryRow): Entry {
        return {
            id: row.id,
            userId: row.user_id,
            category: row.category,
            description: row.description,
            response: row.response,
            createdAt: new Date(row.created_at),
        };
    }
}

export function createEntryStore(db: SqliteDatabase): EntryStore {
    return new EntryStore(db);
}
