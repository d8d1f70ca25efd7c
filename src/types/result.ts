/**
 * @packageDocumentation
 * @module Result
 * @description
 * Discriminated success/failure values returned by the transport and the
 * checkout orchestrator in place of thrown exceptions.
 */
import type { CheckoutError } from './errors';

export interface Ok<T> {
  ok: true;
  value: T;
}

export interface Err<E> {
  ok: false;
  error: E;
}

export type Result<T, E = CheckoutError> = Ok<T> | Err<E>;

export function ok<T>(value: T): Ok<T> {
  return { ok: true, value };
}

export function err<E>(error: E): Err<E> {
  return { ok: false, error };
}

