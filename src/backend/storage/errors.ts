/**
 * Errors raised by the SQLite stores.
 */

export enum StorageErrorCode {
    /** INSERT rejected by the UNIQUE constraint on users.username */
    USERNAME_TAKEN = 'USERNAME_TAKEN',
    /** INSERT rejected by a FOREIGN KEY constraint (the owning user is missing) */
    UNKNOWN_OWNER = 'UNKNOWN_OWNER',
    /** Any other database failure */
    UNKNOWN = 'UNKNOWN',
}

export class StorageError extends Error {
    constructor(
        message: string,
        public readonly code: StorageErrorCode,
        public readonly cause?: unknown
    ) {
        super(message);
        this.name = 'StorageError';
    }
}

/**
 * The SQLite result code carried by a driver error, e.g. `SQLITE_CONSTRAINT_UNIQUE`.
 *
 * Checks the shape rather than the class: the native addon can hand back
 * errors built from another realm's Error constructor.
 */
export function sqliteErrorCode(error: unknown): string | undefined {
    if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * True when better-sqlite3 reported a UNIQUE constraint violation.
 */
export function isUniqueConstraintError(error: unknown): boolean {
    return sqliteErrorCode(error) === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * True when better-sqlite3 reported a FOREIGN KEY constraint violation.
 */
export function isForeignKeyConstraintError(error: unknown): boolean {
    return sqliteErrorCode(error) === 'SQLITE_CONSTRAINT_FOREIGNKEY';
}
