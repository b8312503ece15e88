export type ErrorFamily = 'weather' | 'storage' | 'audit';

/**
 * Base of every failure a component hands back to the orchestrator.
 * `statusCode` is the HTTP status the failure maps to at the boundary;
 * `cause` keeps the underlying error for server-side logs only.
 */
export abstract class ServiceError extends Error {
  abstract readonly family: ErrorFamily;
  abstract readonly kind: string;

  constructor(
    message: string,
    readonly statusCode: number,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

// -------------------------------------------------
// Weather fetch
// -------------------------------------------------
export class WeatherFetchError extends ServiceError {
  readonly family = 'weather';
  readonly kind = 'weather_fetch';

  static notFound(city: string): WeatherFetchError {
    return new WeatherFetchError(`City not found: ${city}`, 404);
  }

  static unavailable(message: string, cause?: unknown): WeatherFetchError {
    return new WeatherFetchError(message, 503, cause);
  }

  static internal(cause: unknown): WeatherFetchError {
    return new WeatherFetchError('Internal weather service error', 500, cause);
  }
}

// -------------------------------------------------
// Object storage (cache)
// -------------------------------------------------
export type StorageErrorKind = 'storage' | 'connection' | 'data' | 'permission' | 'cache';

const STORAGE_STATUS: Record<StorageErrorKind, number> = {
  storage: 500,
  connection: 503,
  data: 400,
  permission: 403,
  cache: 500,
};

const STORAGE_MESSAGES: Record<StorageErrorKind, string> = {
  storage: 'Storage operation failed',
  connection: 'Failed to connect to storage service',
  data: 'Invalid data for storage operation',
  permission: 'Storage permission denied',
  cache: 'Cache operation failed',
};

export class StorageError extends ServiceError {
  readonly family = 'storage';

  constructor(
    readonly kind: StorageErrorKind,
    message: string = STORAGE_MESSAGES[kind],
    cause?: unknown,
  ) {
    super(message, STORAGE_STATUS[kind], cause);
  }
}

// -------------------------------------------------
// Audit log
// -------------------------------------------------
export type AuditErrorKind = 'audit' | 'connection' | 'data' | 'permission';

const AUDIT_STATUS: Record<AuditErrorKind, number> = {
  audit: 500,
  connection: 503,
  data: 400,
  permission: 403,
};

const AUDIT_MESSAGES: Record<AuditErrorKind, string> = {
  audit: 'Audit log operation failed',
  connection: 'Failed to connect to audit log',
  data: 'Invalid data for audit log',
  permission: 'Insufficient permissions for audit log operation',
};

export class AuditError extends ServiceError {
  readonly family = 'audit';

  constructor(
    readonly kind: AuditErrorKind,
    message: string = AUDIT_MESSAGES[kind],
    cause?: unknown,
  ) {
    super(message, AUDIT_STATUS[kind], cause);
  }
}
