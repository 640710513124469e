import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  BrokerError,
  CancelledError,
  ConnectionError,
  ModelsError,
  NotFoundError,
  TimeoutError,
  ValidationError,
  fromZodError,
  hasErrorCode,
  isModelsError,
  toError,
  toTaskError,
  wrapError,
} from '../../../src/utils/errors.js';
import { isCancellation, throwIfCancelled } from '../../../src/utils/cancellation.js';

describe('errors', () => {
  it('serializes to a plain task error payload', () => {
    expect(new NotFoundError('Model instance "m1" not found').toJSON()).toEqual({
      name: 'NotFoundError',
      code: 'NOT_FOUND',
      message: 'Model instance "m1" not found',
    });
  });

  it('keeps the broker hierarchy', () => {
    const connection = new ConnectionError('down');
    const timeout = new TimeoutError('slow', 50);

    expect(connection).toBeInstanceOf(BrokerError);
    expect(connection.code).toBe('CONNECTION_ERROR');
    expect(timeout.code).toBe('TIMEOUT_ERROR');
    expect(timeout.timeoutMs).toBe(50);
    expect(isModelsError(timeout)).toBe(true);
  });

  it('wraps foreign errors as UNKNOWN_ERROR and passes ModelsErrors through', () => {
    const original = new CancelledError();

    expect(wrapError(original)).toBe(original);
    expect(wrapError(new RangeError('boom'))).toMatchObject({ code: 'UNKNOWN_ERROR', message: 'boom' });
    expect(toTaskError('plain string')).toEqual({ name: 'ModelsError', code: 'UNKNOWN_ERROR', message: 'plain string' });
  });

  it('keeps the name of a foreign error in the task payload', () => {
    expect(toTaskError(new TypeError('bad row'))).toEqual({ name: 'TypeError', code: 'UNKNOWN_ERROR', message: 'bad row' });
    expect(toTaskError(new NotFoundError('gone'))).toEqual({ name: 'NotFoundError', code: 'NOT_FOUND', message: 'gone' });
  });

  it('turns zod issues into a ValidationError', () => {
    const result = z.object({ count: z.number() }).safeParse({ count: 'x' });
    expect(result.success).toBe(false);
    if (result.success) return;

    const error = fromZodError(result.error, 'Invalid input');

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.issues).toEqual([{ path: 'count', message: 'Expected number, received string' }]);
    expect(error.message).toBe('Invalid input: count: Expected number, received string');
  });

  it('narrows unknown values', () => {
    const error = new Error('x');

    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
    expect(hasErrorCode(Object.assign(new Error('gone'), { code: 'ENOENT' }), 'ENOENT')).toBe(true);
    expect(hasErrorCode({ code: 'ENOENT' }, 'ENOENT')).toBe(false);
  });

  it('appends the cause to the stack', () => {
    const error = new ModelsError('outer', 'STORAGE_ERROR', new Error('inner'));

    expect(error.stack).toContain('Caused by: Error: inner');
  });
});

describe('cancellation', () => {
  it('throws only once the signal is aborted', () => {
    const controller = new AbortController();

    expect(() => throwIfCancelled(controller.signal, 'saving')).not.toThrow();
    expect(() => throwIfCancelled(undefined)).not.toThrow();

    controller.abort();
    expect(() => throwIfCancelled(controller.signal, 'saving')).toThrow('Operation cancelled before saving');
  });

  it('recognises cancellations', () => {
    expect(isCancellation(new CancelledError())).toBe(true);
    expect(isCancellation(new Error('Operation cancelled'))).toBe(false);
  });
});
