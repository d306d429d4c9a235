import Database from 'better-sqlite3';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { logger } from '../utils/logger';

const APP_DIR_NAME = 'note-taker-pro';
const DB_FILE_NAME = 'notes.db';
const BUSY_TIMEOUT_MS = 5000;

/**
 * Applies the connection pragmas every handle needs: foreign keys for the
 * reminder cascade, and a busy timeout so a second CLI process waits for the
 * write lock instead of failing straight away.
 */
export function configureConnection(db: Database.Database): void {
    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
}

/**
 * Opens a database connection.
 * Creates the database file and directory if they don't exist and enables WAL mode.
 * Does NOT run migrations - that should be handled separately.
 *
 * @param dbPath Optional path to the database file. If omitted, uses the path from `getDbPath()`. If ':memory:', creates an in-memory DB.
 */
export function initDb(dbPath?: string): Database.Database {
    const targetPath = dbPath ?? getDbPath();

    if (targetPath !== ':memory:') {
        ensureDirectoryExists(path.dirname(targetPath));
    }

    logger.debug(`[DB] Initializing new database connection at: ${targetPath}`);
    const newDb = new Database(targetPath);
    configureConnection(newDb);

    // Enable WAL mode for better concurrency (not applicable to :memory:)
    if (targetPath !== ':memory:') {
        try {
            newDb.pragma('journal_mode = WAL');
            logger.debug('[DB] WAL mode enabled.');
        } catch (walError) {
            // May fail on some network file systems, log warning but continue
            logger.warn('[DB] Could not enable WAL mode (may be normal for some file systems): ', walError);
        }
    }

    return newDb;
}

/**
 * Directory for application data when the config does not name one.
 * Follows XDG on Unix-like systems and LOCALAPPDATA on Windows.
 */
export function getDefaultDataDir(): string {
    if (process.platform === 'win32') {
        const base = process.env.LOCALAPPDATA || process.env.APPDATA || os.homedir();
        return path.join(base, APP_DIR_NAME);
    }
    const base = process.env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
    return path.join(base, APP_DIR_NAME);
}

/**
 * Gets the path for the application database.
 * 1. Uses the `NOTETAKER_DB_PATH` environment variable if set (':memory:' is passed through).
 * 2. Otherwise `<dataDir>/notes.db`, where dataDir defaults to `getDefaultDataDir()`.
 */
export function getDbPath(dataDir?: string, env: NodeJS.ProcessEnv = process.env): string {
    const envPath = env.NOTETAKER_DB_PATH;

    if (envPath) {
        if (envPath === ':memory:') {
            logger.debug('[DB] Using in-memory database (from NOTETAKER_DB_PATH).');
            return ':memory:';
        }
        const resolvedEnvPath = path.resolve(envPath);
        logger.debug(`[DB] Using database path from NOTETAKER_DB_PATH: ${resolvedEnvPath}`);
        return resolvedEnvPath;
    }

    return path.resolve(dataDir ?? getDefaultDataDir(), DB_FILE_NAME);
}

/**
 * Helper function to ensure a directory exists.
 * Throws an error if creation fails.
 */
function ensureDirectoryExists(dirPath: string): void {
    if (!fs.existsSync(dirPath)) {
        try {
            fs.mkdirSync(dirPath, { recursive: true });
            logger.info(`[DB Helper] Created database directory: ${dirPath}`);
        } catch (mkdirError) {
            logger.error(`[DB Helper] Failed to create database directory ${dirPath}:`, mkdirError);
            throw new Error(`Failed to create required data directory: ${mkdirError instanceof Error ? mkdirError.message : mkdirError}`);
        }
    }
}
