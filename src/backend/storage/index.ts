/**
 * Data storage modules
 *
 * Persistence layer components:
 * - database: SQLite connection and schema
 * - UserStore: registered accounts
 * - EntryStore: journal entries and their replies
 */

export { openDatabase, isDatabaseHealthy } from './database';
export type { SqliteDatabase } from './database';

export { UserStore, createUserStore } from './userStore';
export type { IUserStore } from './userStore';

export { EntryStore, createEntryStore } from './entryStore';
export type { IEntryStore } from './entryStore';

export {
    StorageError,
    StorageErrorCode,
    sqliteErrorCode,
    isUniqueConstraintError,
    isForeignKeyConstraintError,
} from './errors';
