//explicit fallible results for optional collaborators (models that may be missing or failing)

export interface Unavailable {
  source: string;
  reason: string;
  cause?: unknown;
}

export type Result<T, E = Unavailable> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): Result<T, never> => ({ ok: true, value });

export const unavailable = (source: string, reason: string, cause?: unknown): Result<never, Unavailable> =>
  ({ ok: false, error: { source, reason, ...(cause !== undefined && { cause }) } });

//value of a result, or the fallback when it is unavailable
export function unwrapOr<T, E>(result: Result<T, E>, fallback: T): T {
  return result.ok ? result.value : fallback;
}

//capture a promise into a result instead of letting it throw
export async function attempt<T>(source: string, run: () => Promise<T>): Promise<Result<T>> {
  try {
    return ok(await run());
  } catch (err) {
    return unavailable(source, err instanceof Error ? err.message : String(err), err);
  }
}
