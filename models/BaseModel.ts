import type Database from 'better-sqlite3';
import { logger } from '../utils/logger';
import { DatabaseError } from '../services/base/ServiceError';

function sqliteCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Base class for all models, providing common database handling and error management
 */
export abstract class BaseModel {
  protected readonly db: Database.Database;
  protected abstract readonly modelName: string;

  constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Handle database errors consistently across all models
   * @param context - Description of the operation that failed
   * @throws DatabaseError with formatted message
   */
  protected handleDbError(error: unknown, context: string): never {
    const message = error instanceof Error ? error.message : 'Unknown database error';
    logger.error(`[${this.modelName}] DB error in ${context}: ${message}`, error);

    // Let caller handle unique constraint violations
    if (sqliteCode(error) === 'SQLITE_CONSTRAINT_PRIMARYKEY' || sqliteCode(error) === 'SQLITE_CONSTRAINT_UNIQUE') {
      throw error;
    }

    throw new DatabaseError(context, message, { sqliteCode: sqliteCode(error) });
  }
}
