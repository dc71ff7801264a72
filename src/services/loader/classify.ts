import {
  PermanentStorageError,
  TransientStorageError,
  errorCode,
  errorMessage,
} from '../../lib/errors.js';

// Connection exceptions, insufficient resources, operator intervention.
const TRANSIENT_CLASSES = ['08', '53', '57P'];

const TRANSIENT_STATES = new Set([
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  '55P03', // lock_not_available
  '57014', // query_canceled (statement_timeout)
]);

// Client-side codes from postgres.js and the Node socket layer.
const TRANSIENT_CLIENT_CODES = new Set([
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  'CONNECT_TIMEOUT',
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'ENOTFOUND',
]);

const SQLSTATE = /^[0-9A-Z]{5}$/;

export function classifyStorageError(error: unknown): TransientStorageError | PermanentStorageError {
  if (error instanceof TransientStorageError || error instanceof PermanentStorageError) return error;

  const code = errorCode(error);
  const message = errorMessage(error);

  if (code && TRANSIENT_CLIENT_CODES.has(code)) {
    return new TransientStorageError(`Database unreachable: ${message}`, { cause: error });
  }

  if (code && SQLSTATE.test(code)) {
    const transient = TRANSIENT_STATES.has(code) || TRANSIENT_CLASSES.some((prefix) => code.startsWith(prefix));
    return transient
      ? new TransientStorageError(message, { cause: error, sqlState: code })
      : new PermanentStorageError(message, { cause: error, sqlState: code });
  }

  return new TransientStorageError(message, { cause: error });
}
