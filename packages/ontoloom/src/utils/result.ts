/**
 * Result type for callers that prefer values over exceptions, such as
 * `tryDecodeTurtle`.
 */
export type Result<T, E = Error> =
  | Readonly<{ success: true; data: T }>
  | Readonly<{ success: false; error: E }>;

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): Result<T, never> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<E>(error: E): Result<never, E> {
  return { success: false, error };
}

/**
 * Runs `fn`, capturing a thrown value as a failed result.
 *
 * @example
 * ```typescript
 * const result = attempt(() => decodeTurtle(text), (error) =>
 *   isTurtleSyntaxError(error) ? error : undefined,
 * );
 * ```
 */
export function attempt<T, E>(
  fn: () => T,
  mapError: (error: unknown) => E | undefined,
): Result<T, E> {
  try {
    return ok(fn());
  } catch (error) {
    const mapped = mapError(error);
    if (mapped === undefined) throw error;
    return err(mapped);
  }
}

/**
 * Unwraps a result, throwing if it's an error.
 */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (result.success) {
    return result.data;
  }
  throw result.error;
}

/**
 * Unwraps a result or returns a default value.
 */
export function unwrapOr<T, E>(result: Result<T, E>, defaultValue: T): T {
  return result.success ? result.data : defaultValue;
}

export function isOk<T, E>(
  result: Result<T, E>,
): result is Readonly<{ success: true; data: T }> {
  return result.success;
}

export function isErr<T, E>(
  result: Result<T, E>,
): result is Readonly<{ success: false; error: E }> {
  return !result.success;
}

/**
 * Transforms the success value of a result.
 */
export function map<T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => U,
): Result<U, E> {
  return result.success ? ok(fn(result.data)) : result;
}

/**
 * Transforms the error value of a result.
 */
export function mapErr<T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => F,
): Result<T, F> {
  return result.success ? result : err(fn(result.error));
}

/**
 * Chains an operation that returns a Result on the success value.
 */
export function flatMap<T, U, E>(
  result: Result<T, E>,
  fn: (data: T) => Result<U, E>,
): Result<U, E> {
  return result.success ? fn(result.data) : result;
}

/**
 * Recovers from an error by producing an alternative Result.
 */
export function orElse<T, E, F>(
  result: Result<T, E>,
  fn: (error: E) => Result<T, F>,
): Result<T, F> {
  return result.success ? result : fn(result.error);
}
