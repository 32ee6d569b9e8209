export type Result<T, E = Error> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

/**
 * Run an async call and capture a rejection as a failed Result.
 * Non-Error rejections are wrapped so callers always get an Error.
 */
export async function attempt<T>(
  fn: () => Promise<T>
): Promise<Result<T, Error>> {
  try {
    return ok(await fn());
  } catch (err) {
    return fail(err instanceof Error ? err : new Error(String(err)));
  }
}
