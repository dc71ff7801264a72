import { describe, expect, it } from 'vitest';
import {
  ConfigError,
  NotFoundError,
  PermanentStorageError,
  TransientStorageError,
  ValidationError,
  toJobFailure,
} from '../../src/lib/errors.js';

function errno(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('toJobFailure', () => {
  it('maps the error taxonomy to failure kinds', () => {
    expect(toJobFailure(new ValidationError('Missing required columns: hawb', ['hawb']))).toEqual({
      kind: 'validation',
      message: 'Missing required columns: hawb',
    });
    expect(toJobFailure(new PermanentStorageError('bad cast'))).toEqual({ kind: 'permanent', message: 'bad cast' });
    expect(toJobFailure(new TransientStorageError('lock timeout'))).toEqual({ kind: 'transient', message: 'lock timeout' });
    expect(toJobFailure(new ConfigError('no target'))).toEqual({ kind: 'permanent', message: 'no target' });
  });

  it('splits filesystem errors by errno', () => {
    expect(toJobFailure(errno('EBUSY', 'resource busy')).kind).toBe('transient');
    expect(toJobFailure(errno('EMFILE', 'too many open files')).kind).toBe('transient');
    expect(toJobFailure(errno('EACCES', 'permission denied')).kind).toBe('permanent');
    expect(toJobFailure(errno('ENOENT', 'no such file')).kind).toBe('permanent');
  });

  it('treats anything unrecognized as transient', () => {
    expect(toJobFailure(new Error('socket hang up'))).toEqual({ kind: 'transient', message: 'socket hang up' });
    expect(toJobFailure('oops')).toEqual({ kind: 'transient', message: 'oops' });
  });
});

describe('AppError subclasses', () => {
  it('carry an HTTP status and a machine code', () => {
    const notFound = new NotFoundError('Job', 'abc');
    expect(notFound.statusCode).toBe(404);
    expect(notFound.code).toBe('NOT_FOUND');
    expect(notFound.message).toBe("Job 'abc' not found");

    const transient = new TransientStorageError('deadlock detected', { sqlState: '40P01' });
    expect(transient.statusCode).toBe(503);
    expect(transient.sqlState).toBe('40P01');
  });
});
