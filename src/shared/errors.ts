/**
 * @file errors.ts
 * @module shared/errors
 * @author modsearch contributors
 * @created 2026-10-18
 * @license MIT
 *
 * @fileoverview Error taxonomy and the Result type returned by every
 * fallible operation (query compilation, API calls, downloads).
 */

/**
 * Discriminant shared by all application errors.
 */
export type ErrorKind = 'user-input' | 'remote-application' | 'transport' | 'resource' | 'internal';

/**
 * Base class for every error surfaced to the user.
 */
export abstract class AppError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid filter, sort rule, navigation command or index.
 */
export class UserInputError extends AppError {
  readonly kind = 'user-input';
}

/**
 * Structured error payload returned by the API.
 */
export class RemoteApplicationError extends AppError {
  readonly kind = 'remote-application';
  readonly code: string;
  readonly description: string;

  constructor(code: string, description: string) {
    super(`${code}: ${description}`);
    this.code = code;
    this.description = description;
  }
}

/**
 * Network failure, non-2xx status without an error payload, or malformed JSON.
 * `detail` carries the full diagnostic (usually a stack trace).
 */
export class TransportError extends AppError {
  readonly kind = 'transport';
  readonly detail: string;

  constructor(message: string, detail?: string) {
    super(message);
    this.detail = detail ?? message;
  }
}

/**
 * Filesystem failure while writing a download.
 */
export class ResourceFault extends AppError {
  readonly kind = 'resource';
  readonly path: string;

  constructor(message: string, path: string) {
    super(message);
    this.path = path;
  }
}

/**
 * Inconsistency in the static vocabulary tables. Never caused by user input.
 */
export class InternalError extends AppError {
  readonly kind = 'internal';
}

export type Result<T, E extends AppError = AppError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E extends AppError>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Describe an unknown thrown value, preferring its stack trace.
 */
export function describeThrown(thrown: unknown): string {
  if (thrown instanceof Error) {
    return thrown.stack ?? `${thrown.name}: ${thrown.message}`;
  }
  return String(thrown);
}

/**
 * Wrap an unexpected throw. AppErrors pass through untouched.
 */
export function toAppError(thrown: unknown, wrap: (message: string, detail: string) => AppError): AppError {
  if (thrown instanceof AppError) {
    return thrown;
  }
  const message = thrown instanceof Error ? thrown.message : String(thrown);
  return wrap(message, describeThrown(thrown));
}
