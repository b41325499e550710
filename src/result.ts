/**
 * Result Type
 *
 * Fallible bridge operations return a Result instead of throwing.
 * Narrow on `ok` before reading `value` or `error`.
 */

import type { AnyLuaError } from './error-classes.js';

export interface Ok<T> {
  readonly ok: true;
  readonly value: T;
}

export interface Err<E> {
  readonly ok: false;
  readonly error: E;
}

export type Result<T, E = AnyLuaError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

/**
 * Return the value or throw the error.
 * For call sites where a failure is a bug (scripts, tests).
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.ok) return result.value;
  throw result.error;
}
