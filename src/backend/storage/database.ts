/**
 * SQLite database
 *
 * Opens the database file with better-sqlite3 and creates the two tables the
 * application needs. better-sqlite3 runs each statement synchronously, so a
 * single INSERT is atomic and the UNIQUE constraint on usernames is enforced
 * by SQLite itself.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';

export type SqliteDatabase = Database.Database;

const SCHEMA = `
CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    username TEXT NOT NULL UNIQUE,
    password_hash TEXT NOT NULL,
    created_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS entries (
    id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL REFERENCES users(id),
    category TEXT NOT NULL,
    description TEXT NOT NULL,
    response TEXT NOT NULL,
    created_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_entries_user_created ON entries(user_id, created_at);
`;

const IN_MEMORY = ':memory:';

/**
 * Opens (creating if needed) the database and applies the schema.
 *
 * Errors are not caught here: a database that cannot be opened or migrated
 * must stop the process from starting.
 *
 * @param filename - Path to the database file, or ":memory:"
 */
export function openDatabase(filename: string): SqliteDatabase {
    if (filename !== IN_MEMORY) {
        const directory = path.dirname(path.resolve(filename));
        if (!fs.existsSync(directory)) {
            fs.mkdirSync(directory, { recursive: true });
        }
    }

    const db = new Database(filename);
    db.pragma('foreign_keys = ON');
    if (filename !== IN_MEMORY) {
        db.pragma('journal_mode = WAL');
    }
    db.exec(SCHEMA);

    return db;
}

/**
 * Returns true when the database answers a trivial query.
 */
export function isDatabaseHealthy(db: SqliteDatabase): boolean {
    try {
        db.prepare('SELECT 1').get();
        return true;
    } catch (error) {
        console.error('Database health check failed:', error);
        return false;
    }
}
