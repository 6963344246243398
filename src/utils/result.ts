/**
 * Result union for operations whose contract is "report, never throw".
 */

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

/**
 * Run an async function and capture a thrown value as an error result.
 */
export async function attempt<T>(fn: () => Promise<T>): Promise<Result<T, unknown>> {
  try {
    return ok(await fn());
  } catch (error) {
    return err(error);
  }
}

/**
 * Message of a thrown value, whatever its type.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
