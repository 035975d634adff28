/**
 * Result pattern for the infrastructure boundary
 * Cluster calls report failures as values; the relay layer turns them into typed errors.
 */

/**
 * Result type - simple discriminated union. A failure may carry the HTTP status
 * the cluster API answered with.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; statusCode?: number };

/**
 * Create a success result
 */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result
 */
export const Failure = <T>(error: string, statusCode?: number): Result<T> =>
  statusCode === undefined ? { ok: false, error } : { ok: false, error, statusCode };

export const isOk = <T>(result: Result<T>): result is { ok: true; value: T } => result.ok;

export const isFail = <T>(
  result: Result<T>,
): result is { ok: false; error: string; statusCode?: number } => !result.ok;
