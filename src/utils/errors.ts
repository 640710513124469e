/**
 * Error types for the model manager and background task layer.
 *
 * Synchronous managers throw these directly. Background managers only throw
 * them for submission-time problems; failures inside a worker are stored on
 * the task record as a {@link TaskErrorPayload} instead.
 */

import type { ZodError } from 'zod';

export const MODELS_ERROR_CODES = [
  'VALIDATION_ERROR',
  'NOT_FOUND',
  'ALREADY_EXISTS',
  'CONFLICT',
  'STORAGE_ERROR',
  'BROKER_ERROR',
  'CONNECTION_ERROR',
  'TIMEOUT_ERROR',
  'WORKER_FAILURE',
  'CANCELLED',
  'CONFIGURATION_ERROR',
  'UNKNOWN_ERROR',
] as const;

export type ModelsErrorCode = (typeof MODELS_ERROR_CODES)[number];

/**
 * Plain, JSON-safe shape of an error as stored in the result backend.
 */
export interface TaskErrorPayload {
  name: string;
  code: ModelsErrorCode;
  message: string;
}

/**
 * Base error class for everything raised by this package
 */
export class ModelsError extends Error {
  constructor(
    message: string,
    public readonly code: ModelsErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ModelsError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }

  toJSON(): TaskErrorPayload {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Unknown model type, malformed model name or malformed payload
 */
export class ValidationError extends ModelsError {
  constructor(
    message: string,
    public readonly issues: Array<{ path: string; message: string }> = [],
    cause?: Error
  ) {
    super(message, 'VALIDATION_ERROR', cause);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ModelsError {
  constructor(message: string, cause?: Error) {
    super(message, 'NOT_FOUND', cause);
    this.name = 'NotFoundError';
  }
}

export class AlreadyExistsError extends ModelsError {
  constructor(message: string, cause?: Error) {
    super(message, 'ALREADY_EXISTS', cause);
    this.name = 'AlreadyExistsError';
  }
}

/**
 * Raised when a model already has a task in flight
 */
export class ConflictError extends ModelsError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFLICT', cause);
    this.name = 'ConflictError';
  }
}

/**
 * File I/O failure on a model artifact or its sidecar
 */
export class StorageError extends ModelsError {
  constructor(
    message: string,
    public readonly path?: string,
    cause?: Error
  ) {
    super(message, 'STORAGE_ERROR', cause);
    this.name = 'StorageError';
  }
}

/**
 * Queue or result backend unreachable, or a message could not be delivered
 */
export class BrokerError extends ModelsError {
  constructor(message: string, code: ModelsErrorCode = 'BROKER_ERROR', cause?: Error) {
    super(message, code, cause);
    this.name = 'BrokerError';
  }
}

export class ConnectionError extends BrokerError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONNECTION_ERROR', cause);
    this.name = 'ConnectionError';
  }
}

export class TimeoutError extends BrokerError {
  constructor(message: string, public readonly timeoutMs: number, cause?: Error) {
    super(message, 'TIMEOUT_ERROR', cause);
    this.name = 'TimeoutError';
  }
}

/**
 * The remote operation raised. Carries the payload the worker stored.
 */
export class WorkerFailure extends ModelsError {
  constructor(
    message: string,
    public readonly taskId: string,
    public readonly payload?: TaskErrorPayload
  ) {
    super(message, 'WORKER_FAILURE');
    this.name = 'WorkerFailure';
  }
}

export class CancelledError extends ModelsError {
  constructor(message = 'Operation cancelled', cause?: Error) {
    super(message, 'CANCELLED', cause);
    this.name = 'CancelledError';
  }
}

export class ConfigurationError extends ModelsError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

export function isModelsError(error: unknown): error is ModelsError {
  return error instanceof ModelsError;
}

/**
 * Narrow a caught value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap unknown error as ModelsError
 */
export function wrapError(error: unknown, message?: string): ModelsError {
  if (isModelsError(error)) {
    return error;
  }

  const errorMessage = message || (error instanceof Error ? error.message : String(error));
  const cause = error instanceof Error ? error : undefined;

  return new ModelsError(errorMessage, 'UNKNOWN_ERROR', cause);
}

/**
 * Convert zod issues into a ValidationError
 */
export function fromZodError(error: ZodError, message: string): ValidationError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : 'root',
    message: issue.message,
  }));
  const detail = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
  return new ValidationError(`${message}: ${detail}`, issues);
}

/**
 * Serialisable payload for the result backend
 */
export function toTaskError(error: unknown): TaskErrorPayload {
  const payload = wrapError(error).toJSON();
  // Keep TypeError, RangeError, ... thrown by model plugins
  if (!isModelsError(error) && error instanceof Error) {
    return { ...payload, name: error.name };
  }
  return payload;
}

/**
 * Node errno helper (ENOENT, EEXIST, ...)
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
