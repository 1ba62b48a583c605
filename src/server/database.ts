/**
 * Database access for the persons service.
 *
 * The connection string names an SQLite database:
 *   - `:memory:` for a private in-memory database
 *   - `file:///abs/path.db` or `file:relative/path.db`
 *   - a plain filesystem path
 *
 * Callers own the returned handle and pass it to whatever needs it.
 */

import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

export const MEMORY_DATABASE = ':memory:';

export function resolveDatabasePath(connectionString: string): string {
    if (connectionString === MEMORY_DATABASE) {
        return connectionString;
    }
    if (connectionString.startsWith('file://')) {
        return fileURLToPath(connectionString);
    }
    if (connectionString.startsWith('file:')) {
        return connectionString.slice('file:'.length);
    }
    return connectionString;
}

/**
 * Open the database and provision the schema. Throws when the file cannot
 * be opened or the table cannot be created.
 */
export function openDatabase(connectionString: string): Database.Database {
    const dbPath = resolveDatabasePath(connectionString);

    if (dbPath !== MEMORY_DATABASE) {
        fs.mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    }

    const db = new Database(dbPath);
    try {
        if (dbPath !== MEMORY_DATABASE) {
            db.pragma('journal_mode = WAL');
        }
        initSchema(db);
    } catch (error) {
        db.close();
        throw error;
    }
    return db;
}

// ─── Schema ──────────────────────────────────────────────────────────────────

export function initSchema(db: Database.Database): void {
    db.exec(`
        CREATE TABLE IF NOT EXISTS persons (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            name TEXT NOT NULL,
            age INTEGER,
            address TEXT,
            work TEXT
        );
    `);
}
