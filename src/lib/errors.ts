export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string) {
    super(`${resource} '${id}' not found`, 404, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
    this.name = 'ConflictError';
  }
}

/** Malformed file, missing required column, no usable rows. Never retried. */
export class ValidationError extends AppError {
  constructor(
    message: string,
    public readonly details: string[] = [],
  ) {
    super(message, 400, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class ConfigError extends AppError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, 500, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** Connection loss, lock or serialization conflict, timeout. Retried with backoff. */
export class TransientStorageError extends AppError {
  readonly sqlState: string | undefined;

  constructor(message: string, options?: { cause?: unknown; sqlState?: string }) {
    super(message, 503, 'TRANSIENT_STORAGE_ERROR');
    this.name = 'TransientStorageError';
    this.sqlState = options?.sqlState;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

/** Constraint violation outside the upsert key, type coercion failure, misconfiguration. */
export class PermanentStorageError extends AppError {
  readonly sqlState: string | undefined;

  constructor(message: string, options?: { cause?: unknown; sqlState?: string }) {
    super(message, 500, 'PERMANENT_STORAGE_ERROR');
    this.name = 'PermanentStorageError';
    this.sqlState = options?.sqlState;
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export type FailureKind = 'validation' | 'transient' | 'permanent';

export interface JobFailure {
  kind: FailureKind;
  message: string;
}

// Filesystem errno values worth another attempt; any other errno is permanent.
const TRANSIENT_ERRNO = new Set(['EBUSY', 'EAGAIN', 'EMFILE', 'ENFILE', 'ETIMEDOUT', 'EIO']);

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Reduces anything thrown during an attempt to the classification the queue
 * branches on. Unknown errors are transient so the retry ceiling bounds them.
 */
export function toJobFailure(error: unknown): JobFailure {
  const message = errorMessage(error);

  if (error instanceof ValidationError) return { kind: 'validation', message };
  if (error instanceof PermanentStorageError) return { kind: 'permanent', message };
  if (error instanceof TransientStorageError) return { kind: 'transient', message };
  if (error instanceof ConfigError) return { kind: 'permanent', message };

  const code = errorCode(error);
  if (code && /^E[A-Z]+$/.test(code)) {
    return { kind: TRANSIENT_ERRNO.has(code) ? 'transient' : 'permanent', message };
  }

  return { kind: 'transient', message };
}
