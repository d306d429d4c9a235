import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { configureConnection } from './db';
import { logger } from '../utils/logger';

const MIGRATIONS_DIR_NAME = 'migrations';
const MIGRATIONS_TABLE_NAME = 'schema_migrations';

/**
 * Ensures the schema_migrations table exists on the given DB instance.
 */
function ensureMigrationsTableExists(db: Database.Database): void {
    try {
        db.exec(`
            CREATE TABLE IF NOT EXISTS ${MIGRATIONS_TABLE_NAME} (
                version TEXT PRIMARY KEY,
                applied_at DATETIME DEFAULT (strftime('%Y-%m-%dT%H:%M:%S.000Z', 'now'))
            );
        `);
        logger.debug(`[Migrations] Ensured table '${MIGRATIONS_TABLE_NAME}' exists.`);
    } catch (error) {
        logger.error(`[Migrations] Failed to ensure migrations table '${MIGRATIONS_TABLE_NAME}':`, error);
        throw error;
    }
}

/**
 * Gets a Set of already applied migration versions from the given database instance.
 */
function getAppliedMigrations(db: Database.Database): Set<string> {
    ensureMigrationsTableExists(db);
    const rows = db.prepare(`SELECT version FROM ${MIGRATIONS_TABLE_NAME}`).all() as { version: string }[];
    return new Set(rows.map(r => r.version));
}

/**
 * Resolves the directory holding the .sql files. In source mode it sits next
 * to this file; in a build (dist/models) tsc does not copy it, so fall back to
 * the project's models/migrations.
 */
export function getMigrationsDir(): string {
    const besideThisFile = path.join(__dirname, MIGRATIONS_DIR_NAME);
    if (fs.existsSync(besideThisFile)) {
        return besideThisFile;
    }
    return path.resolve(__dirname, '..', '..', 'models', MIGRATIONS_DIR_NAME);
}

/**
 * Reads migration filenames from the migrations directory, sorted alphabetically.
 */
function getMigrationFiles(migrationsPath: string): string[] {
    if (!fs.existsSync(migrationsPath)) {
        logger.warn(`[Migrations] Migrations directory not found: ${migrationsPath}. No migrations will be applied.`);
        return [];
    }
    return fs.readdirSync(migrationsPath)
        .filter(file => file.endsWith('.sql'))
        .sort(); // 0001_.., 0002_..
}

/**
 * Runs all pending database migrations on the provided DB instance.
 * Each migration runs in its own transaction together with its bookkeeping row.
 */
function runMigrations(db: Database.Database): void {
    logger.debug('[Migrations] Starting database migration check...');

    // Connections opened directly (tests) need the same pragmas as initDb gives.
    configureConnection(db);

    const appliedVersions = getAppliedMigrations(db);
    const migrationsPath = getMigrationsDir();
    const migrationFiles = getMigrationFiles(migrationsPath);
    let migrationsAppliedCount = 0;

    for (const filename of migrationFiles) {
        const version = path.basename(filename, '.sql');

        if (appliedVersions.has(version)) {
            logger.debug(`[Migrations] Skipping already applied migration: ${version}`);
            continue;
        }

        logger.info(`[Migrations] Applying migration: ${version}...`);
        const filePath = path.join(migrationsPath, filename);
        let sql: string;
        try {
            sql = fs.readFileSync(filePath, 'utf8');
        } catch (readError) {
            logger.error(`[Migrations] FAILED to read migration file ${filePath}:`, readError);
            throw new Error(`Failed to read migration file ${filename}. Halting further migrations.`);
        }

        // Re-checked under the write lock: another process may have applied it
        const runMigrationTx = db.transaction((): boolean => {
            const alreadyApplied = db.prepare(`SELECT 1 FROM ${MIGRATIONS_TABLE_NAME} WHERE version = ?`).get(version);
            if (alreadyApplied) {
                return false;
            }
            db.exec(sql);
            db.prepare(`INSERT INTO ${MIGRATIONS_TABLE_NAME} (version) VALUES (?)`).run(version);
            return true;
        });

        try {
            if (runMigrationTx.immediate()) {
                migrationsAppliedCount++;
            }
        } catch (migrationError) {
            logger.error(`[Migrations] FAILED to apply migration ${version}:`, migrationError);
            throw new Error(`Migration ${version} (${filename}) failed. Halting further migrations.`);
        }
    }

    if (migrationsAppliedCount > 0) {
        logger.info(`[Migrations] Applied ${migrationsAppliedCount} new migration(s).`);
    } else {
        logger.debug('[Migrations] Database schema is up to date.');
    }
}

export default runMigrations;
export { runMigrations };
