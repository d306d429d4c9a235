import { logger } from '../../utils/logger';
import type Database from 'better-sqlite3';

/**
 * Abstract base class for all services.
 * Provides common functionality like logging, error handling, and lifecycle management.
 */
export abstract class BaseService<TDeps = {}> {
  protected readonly logger = logger;
  protected readonly serviceName: string;
  protected readonly deps: TDeps;

  constructor(serviceName: string, deps: TDeps) {
    this.serviceName = serviceName;
    this.deps = deps;
  }

  /**
   * Initialize the service. Override this method to perform any async initialization.
   * Called during application bootstrap.
   */
  async initialize(): Promise<void> {
    // Override in subclasses if needed
  }

  /**
   * Cleanup resources used by the service. Override this method to perform cleanup.
   * Called during application shutdown.
   */
  async cleanup(): Promise<void> {
    // Override in subclasses if needed
  }

  /**
   * Execute an async operation with automatic logging and error handling.
   * @param operation The operation name for logging
   * @param fn The async function to execute
   * @param context Optional context object for logging
   */
  protected async execute<T>(
    operation: string,
    fn: () => Promise<T>,
    context?: Record<string, unknown>
  ): Promise<T> {
    const startTime = Date.now();
    const logContext = context ? `, context: ${JSON.stringify(context)}` : '';

    this.logger.debug(`[${this.serviceName}] ${operation} started${logContext}`);

    try {
      const result = await fn();
      const duration = Date.now() - startTime;

      this.logger.debug(`[${this.serviceName}] ${operation} completed in ${duration}ms`);

      return result;
    } catch (error) {
      const duration = Date.now() - startTime;
      this.logger.error(`[${this.serviceName}] ${operation} failed after ${duration}ms:`, error);
      throw error;
    }
  }

  /**
   * Log an info message with service context
   */
  protected logInfo(message: string, ...args: unknown[]): void {
    this.logger.info(`[${this.serviceName}] ${message}`, ...args);
  }

  /**
   * Log a debug message with service context
   */
  protected logDebug(message: string, ...args: unknown[]): void {
    this.logger.debug(`[${this.serviceName}] ${message}`, ...args);
  }

  /**
   * Log a warning message with service context
   */
  protected logWarn(message: string, ...args: unknown[]): void {
    this.logger.warn(`[${this.serviceName}] ${message}`, ...args);
  }

  /**
   * Log an error message with service context
   */
  protected logError(message: string, error?: unknown, ...args: unknown[]): void {
    if (error) {
      this.logger.error(`[${this.serviceName}] ${message}`, error, ...args);
    } else {
      this.logger.error(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  /**
   * Execute a function within an IMMEDIATE database transaction. SQLite takes
   * the write lock on the database file up front, so a second process writing
   * at the same time waits for the busy timeout instead of interleaving.
   * Note: The callback MUST be synchronous as better-sqlite3 doesn't support async transactions.
   */
  protected withTransaction<T>(
    db: Database.Database,
    fn: () => T
  ): T {
    const transaction = db.transaction(fn);

    try {
      const result = transaction.immediate();
      this.logDebug('Transaction completed successfully');
      return result;
    } catch (error) {
      this.logError('Transaction failed:', error);
      throw error;
    }
  }
}
