export type AttemptOutcome<T> = { ok: true; value: T } | { ok: false; lastError: unknown };

/**
 * Run `operation` up to `budget` times. Errors rejected by `isRetryable` are
 * rethrown at once; otherwise the last one is returned once the budget is spent.
 */
export async function runAttempts<T>(
  budget: number,
  operation: (attempt: number) => Promise<T>,
  isRetryable: (error: unknown) => boolean = () => true,
  onFailure?: (error: unknown, attempt: number) => Promise<void> | void,
): Promise<AttemptOutcome<T>> {
  let lastError: unknown = undefined;
  for (let attempt = 1; attempt <= budget; attempt++) {
    try {
      return { ok: true, value: await operation(attempt) };
    } catch (error) {
      if (!isRetryable(error)) throw error;
      lastError = error;
      await onFailure?.(error, attempt);
    }
  }
  return { ok: false, lastError };
}
