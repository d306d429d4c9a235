/**
 * Process exit codes the CLI maps errors to.
 */
export const EXIT_CODES = {
  ok: 0,
  fatal: 1,
  usage: 2,
  syncUnavailable: 3,
  syncConflict: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Base error class for all service-related errors
 */
export class ServiceError extends Error {
  public readonly code: string;
  public readonly exitCode: ExitCode;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: ExitCode = EXIT_CODES.fatal, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ServiceError';
    this.code = code;
    this.exitCode = exitCode;
    this.details = details;

    // Maintains proper stack trace for where error was thrown
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Error thrown when a requested resource is not found
 */
export class NotFoundError extends ServiceError {
  constructor(resource: string, id?: string, details?: Record<string, unknown>) {
    const message = id
      ? `${resource} with id '${id}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', EXIT_CODES.usage, details);
    this.name = 'NotFoundError';
  }
}

/**
 * Error thrown when input validation fails
 */
export class ValidationError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', EXIT_CODES.usage, details);
    this.name = 'ValidationError';
  }
}

/**
 * Raised by the cipher when a blob fails authentication: wrong key, tampered
 * ciphertext or a malformed envelope.
 */
export class AuthenticationError extends ServiceError {
  constructor(message: string = 'Ciphertext failed authentication', details?: Record<string, unknown>) {
    super(message, 'AUTHENTICATION_ERROR', EXIT_CODES.fatal, details);
    this.name = 'AuthenticationError';
  }
}

/**
 * Raised by the note store when persisted notes cannot be decrypted, either
 * because no key was supplied or because the key is wrong.
 */
export class DecryptionError extends ServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DECRYPTION_ERROR', EXIT_CODES.fatal, details);
    this.name = 'DecryptionError';
  }
}

/**
 * Error thrown when user is not authorized to perform an action
 */
export class AuthorizationError extends ServiceError {
  constructor(action: string, resource?: string, details?: Record<string, unknown>) {
    const message = resource
      ? `Not authorized to ${action} ${resource}`
      : `Not authorized to ${action}`;
    super(message, 'AUTHORIZATION_ERROR', EXIT_CODES.fatal, details);
    this.name = 'AuthorizationError';
  }
}

/**
 * Error thrown when an external service fails
 */
export class ExternalServiceError extends ServiceError {
  public readonly service: string;
  public readonly status?: number;
  public readonly retryable: boolean;

  constructor(service: string, message: string, options: { status?: number; retryable?: boolean } = {}, details?: Record<string, unknown>) {
    super(`External service '${service}' error: ${message}`, 'EXTERNAL_SERVICE_ERROR', EXIT_CODES.syncUnavailable, details);
    this.name = 'ExternalServiceError';
    this.service = service;
    this.status = options.status;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Raised once remote calls have exhausted their retries. Local operations
 * keep working.
 */
export class SyncUnavailableError extends ServiceError {
  public readonly attempts: number;

  constructor(operation: string, attempts: number, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
    super(`Sync unavailable: ${operation} failed after ${attempts} attempt(s): ${reason}`, 'SYNC_UNAVAILABLE', EXIT_CODES.syncUnavailable, { operation, attempts });
    this.name = 'SyncUnavailableError';
    this.attempts = attempts;
  }
}

/**
 * Error thrown when a database operation fails
 */
export class DatabaseError extends ServiceError {
  public readonly operation: string;

  constructor(operation: string, message: string, details?: Record<string, unknown>) {
    super(`Database ${operation} failed: ${message}`, 'DATABASE_ERROR', EXIT_CODES.fatal, details);
    this.name = 'DatabaseError';
    this.operation = operation;
  }
}

/**
 * Error thrown when an operation times out
 */
export class TimeoutError extends ServiceError {
  public readonly timeout: number;

  constructor(operation: string, timeout: number, details?: Record<string, unknown>) {
    super(`Operation '${operation}' timed out after ${timeout}ms`, 'TIMEOUT_ERROR', EXIT_CODES.syncUnavailable, details);
    this.name = 'TimeoutError';
    this.timeout = timeout;
  }
}

/**
 * Error thrown when local and remote copies of a note diverged. The conflict
 * is recorded and left for the user to resolve.
 */
export class ConflictError extends ServiceError {
  public readonly noteId: string;

  constructor(noteId: string, message: string, details?: Record<string, unknown>) {
    super(`Conflict with note '${noteId}': ${message}`, 'CONFLICT_ERROR', EXIT_CODES.syncConflict, details);
    this.name = 'ConflictError';
    this.noteId = noteId;
  }
}

/**
 * Raised by a remote store when a conditional write or delete names a
 * revision that is no longer current.
 */
export class RemoteRevisionConflictError extends ServiceError {
  constructor(noteId: string, expectedRevision: string | null) {
    super(`Remote copy of '${noteId}' is not at revision ${expectedRevision ?? '(none)'}`, 'REMOTE_REVISION_CONFLICT', EXIT_CODES.syncConflict, { noteId, expectedRevision });
    this.name = 'RemoteRevisionConflictError';
  }
}

/**
 * Error thrown when an export format is not supported
 */
export class UnsupportedFormatError extends ServiceError {
  constructor(format: string) {
    super(`Unsupported export format '${format}'`, 'UNSUPPORTED_FORMAT', EXIT_CODES.usage, { format });
    this.name = 'UnsupportedFormatError';
  }
}
