/**
 * Error hierarchy shared by the registry, collector, service, routes and CLI.
 * Each class fixes a machine-readable `code` and the HTTP status it maps to.
 */

/**
 * Base application error with structured metadata
 */
export abstract class AppError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;
  readonly timestamp: Date = new Date();
  override readonly cause?: unknown;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message);
    this.name = new.target.name;
    this.cause = options?.cause;
    Error.captureStackTrace?.(this, new.target);
  }

  /** Extra fields a subclass adds to its serialized form */
  protected details(): Record<string, unknown> {
    return {};
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
      ...this.details(),
      stack: this.stack,
    };
  }
}

/**
 * Malformed filters, ids or settings. `errors` lists one entry per bad input.
 */
export class ValidationError extends AppError {
  readonly code = 'VALIDATION_ERROR' as const;
  readonly statusCode = 400;
  readonly field?: string;
  readonly errors?: ReadonlyArray<{ path: string[]; message: string }>;

  constructor(
    message: string,
    options?: {
      field?: string;
      errors?: ReadonlyArray<{ path: string[]; message: string }>;
      cause?: unknown;
    }
  ) {
    super(message, options);
    this.field = options?.field;
    this.errors = options?.errors;
  }

  protected override details(): Record<string, unknown> {
    return {
      field: this.field,
      errors: this.errors,
    };
  }
}

/**
 * Entity not found - the requested entity type/id does not resolve.
 * Precondition failure of a whole collection request; no partial report.
 */
export class EntityNotFoundError extends AppError {
  readonly code = 'ENTITY_NOT_FOUND' as const;
  readonly statusCode = 404;
  readonly entityType: string;
  readonly entityId: string;

  constructor(entityType: string, entityId: string, options?: { cause?: unknown }) {
    super(`Entity ${entityType}/${entityId} not found.`, options);
    this.entityType = entityType;
    this.entityId = entityId;
  }

  protected override details(): Record<string, unknown> {
    return {
      entityType: this.entityType,
      entityId: this.entityId,
    };
  }
}

/**
 * Unknown plugin - the id is not part of the current descriptor set
 */
export class UnknownPluginError extends AppError {
  readonly code = 'UNKNOWN_PLUGIN' as const;
  readonly statusCode = 404;
  readonly pluginId: string;

  constructor(pluginId: string, options?: { cause?: unknown }) {
    super(`Unknown intel plugin: ${pluginId}`, options);
    this.pluginId = pluginId;
  }

  protected override details(): Record<string, unknown> {
    return {
      pluginId: this.pluginId,
    };
  }
}

/**
 * Recoverable failure raised from inside a plugin's collect().
 * The collector turns it into an `error` entry for that plugin.
 */
export class PluginCollectionError extends AppError {
  readonly code = 'PLUGIN_COLLECTION_ERROR' as const;
  readonly statusCode = 500;
  readonly pluginId: string;

  constructor(pluginId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.pluginId = pluginId;
  }

  protected override details(): Record<string, unknown> {
    return {
      pluginId: this.pluginId,
    };
  }
}

/**
 * Duplicate registration of a plugin id or descriptor
 */
export class ConflictError extends AppError {
  readonly code = 'CONFLICT' as const;
  readonly statusCode = 409;
  readonly resource?: string;

  constructor(message: string, options?: { resource?: string; cause?: unknown }) {
    super(message, options);
    this.resource = options?.resource;
  }

  protected override details(): Record<string, unknown> {
    return {
      resource: this.resource,
    };
  }
}

/**
 * A plugin ran past the collector's time budget
 */
export class TimeoutError extends AppError {
  readonly code = 'TIMEOUT' as const;
  readonly statusCode = 408;
  readonly operation: string;
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, options);
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }

  protected override details(): Record<string, unknown> {
    return {
      operation: this.operation,
      timeoutMs: this.timeoutMs,
    };
  }
}


export class InternalError extends AppError {
  readonly code = 'INTERNAL_ERROR' as const;
  readonly statusCode = 500;

  constructor(message: string = 'An internal error occurred', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Anything thrown, as an AppError. Foreign errors become the `cause` of an InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error;
  }
  if (error instanceof Error) {
    return new InternalError(error.message, { cause: error });
  }
  return new InternalError(String(error));
}

/**
 * Extract error message from an unknown catch value.
 * Without a fallback, stringifies non-Error values via String().
 * With a fallback, returns the fallback for non-Error values.
 */
export function getErrorMessage(error: unknown, fallback?: string): string {
  return error instanceof Error ? error.message : (fallback ?? String(error));
}
