export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantError";
  }
}

/**
* Assert that a condition is truthy.
*
* Throws {@link InvariantError} when the assertion fails. Reserved for states that
* only a defect in this library can produce; recoverable input problems are
* returned as a {@link Result} instead.
*/
export function invariant(condition: unknown, message = "Invariant violation"): asserts condition {
  if (!condition) {
    throw new InvariantError(message);
  }
}

/**
* Exhaustiveness helper for `switch` statements.
*
* Throws an error if called.
*/
export function assertNever(value: never, message = "Unexpected value"): never {
  throw new Error(`${message}: ${String(value)}`);
}

/**
 * Success-or-failure union used instead of throwing for recoverable input errors.
 *
 * Example:
 * - `{ ok: true, value: 42 }`
 * - `{ ok: false, error: { kind: "negative-input", jd: -1 } }`
 */
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Unwrap a {@link Result}, throwing `onError(error)` for failures.
 *
 * Intended for call sites (scripts, tests) that cannot meaningfully continue.
 */
export function unwrap<T, E>(result: Result<T, E>, onError: (error: E) => Error): T {
  if (result.ok) return result.value;
  throw onError(result.error);
}
