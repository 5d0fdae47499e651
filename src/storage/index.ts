import Database from 'better-sqlite3';
import { join, isAbsolute } from 'path';
import { getConfig } from '../config.js';
import { initDB } from './db.js';
import { migrate } from './migrations.js';

let dbInstance: Database.Database | null = null;
let configuredDbPath: string | null = null;

/**
 * Resolve database path, ensuring it's absolute.
 *
 * Priority:
 * 1. Explicit path argument
 * 2. configureDbPath()
 * 3. COMBAT_DB_PATH (via config), `:memory:` under NODE_ENV=test
 */
function resolveDbPath(path?: string): string {
    const dbPath = path || configuredDbPath || getConfig().dbPath;

    // Special case: SQLite in-memory database
    if (dbPath === ':memory:' || isAbsolute(dbPath)) {
        return dbPath;
    }

    return join(process.cwd(), dbPath);
}

/**
 * Configure the database path before initialization.
 * Call this before getDb() to set a custom path.
 */
export function configureDbPath(path: string): void {
    if (dbInstance) {
        throw new Error('Cannot configure database path after database has been initialized');
    }
    configuredDbPath = path === ':memory:' || isAbsolute(path) ? path : join(process.cwd(), path);
}

/**
 * Get the configured or default database path (for logging/debugging).
 */
export function getDbPath(): string {
    return resolveDbPath();
}

export function getDb(path?: string): Database.Database {
    if (!dbInstance) {
        const resolvedPath = resolveDbPath(path);
        console.error(`[Database] Initializing database at: ${resolvedPath}`);
        dbInstance = initDB(resolvedPath);
        migrate(dbInstance);
    }
    return dbInstance;
}

/**
 * Close the database with proper WAL checkpoint.
 */
export function closeDb() {
    if (dbInstance) {
        try {
            if (dbInstance.name !== ':memory:') {
                dbInstance.pragma('wal_checkpoint(TRUNCATE)');
                console.error('[Database] WAL checkpoint completed');
            }
        } catch (e) {
            console.error('[Database] WAL checkpoint failed:', e instanceof Error ? e.message : String(e));
        }
        dbInstance.close();
        dbInstance = null;
        configuredDbPath = null;
        console.error('[Database] Database closed');
    }
}

export * from './db.js';
export * from './migrations.js';
export * from './repos/combat-handler.repo.js';
