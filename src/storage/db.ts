import Database from 'better-sqlite3';
import { existsSync, unlinkSync } from 'fs';

export interface DatabaseIntegrityResult {
    ok: boolean;
    errors: string[];
}

function errorMessage(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}

/**
 * Check database integrity using SQLite's integrity_check pragma.
 */
export function checkDatabaseIntegrity(db: Database.Database): DatabaseIntegrityResult {
    try {
        const rows: unknown = db.pragma('integrity_check');
        const errors = (Array.isArray(rows) ? rows : [])
            .map((row: unknown) =>
                typeof row === 'object' && row !== null && 'integrity_check' in row
                    ? String(row.integrity_check)
                    : 'unreadable integrity_check row')
            .filter(msg => msg !== 'ok');

        return {
            ok: errors.length === 0,
            errors
        };
    } catch (e) {
        return {
            ok: false,
            errors: [errorMessage(e)]
        };
    }
}

/**
 * Remove a corrupted database file and its WAL/SHM companions so a fresh
 * one can be created in its place.
 */
function handleCorruptedDatabase(path: string, error: Error): void {
    console.error(`[Database] CRITICAL: Database corruption detected at ${path}`);
    console.error(`[Database] Error: ${error.message}`);

    const files = [path, `${path}-wal`, `${path}-shm`];

    try {
        for (const file of files) {
            if (existsSync(file)) {
                unlinkSync(file);
                console.error(`[Database] Removed: ${file}`);
            }
        }
        console.error('[Database] Recovery complete. A fresh database will be created.');
    } catch (cleanupError) {
        console.error(`[Database] Failed to clean up corrupted files: ${errorMessage(cleanupError)}`);
        throw new Error(`Database is corrupted and cleanup failed. Please manually delete: ${files.join(', ')}`);
    }
}

function openDatabase(path: string): Database.Database {
    const db = new Database(path);
    try {
        if (path !== ':memory:') {
            db.pragma('journal_mode = WAL');
        }
        db.pragma('foreign_keys = ON');
    } catch (e) {
        db.close();
        throw e;
    }
    return db;
}

export function initDB(path: string): Database.Database {
    console.error(`[Database] Opening database: ${path}`);

    let db: Database.Database;

    try {
        db = openDatabase(path);
    } catch (e) {
        const message = errorMessage(e);
        // If we can't even open the database, it's likely corrupted
        if (message.includes('SQLITE_CORRUPT') || message.includes('malformed') || message.includes('not a database')) {
            handleCorruptedDatabase(path, new Error(message));
            db = openDatabase(path);
        } else {
            throw e;
        }
    }

    const integrity = checkDatabaseIntegrity(db);
    if (!integrity.ok) {
        console.error('[Database] Integrity check failed:');
        integrity.errors.forEach(err => console.error(`  - ${err}`));

        db.close();
        handleCorruptedDatabase(path, new Error(integrity.errors.join(', ')));
        db = openDatabase(path);

        console.error('[Database] Fresh database created after corruption recovery');
    }

    return db;
}
