/**
 * Explicit result-or-error values for concurrent sub-computations.
 * `settle` never rejects, so sibling tasks joined with Promise.all keep
 * running when one of them fails.
 */

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: unknown };

export async function settle<T>(task: Promise<T>): Promise<Outcome<T>> {
  try {
    return { ok: true, value: await task };
  } catch (error) {
    return { ok: false, error };
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
