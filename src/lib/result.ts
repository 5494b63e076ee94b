import { toError } from './errors.js';

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail<E = Error>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Runs an async collaborator call and captures a rejection as a failed Result,
 * so callers branch on `ok` instead of wrapping every call site in try/catch.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await fn());
  } catch (err) {
    return fail(toError(err));
  }
}
