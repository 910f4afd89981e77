// ── Timing helpers ───────────────────────────────────────────

export type Sleep = (ms: number) => Promise<void>;

export const delay: Sleep = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Settle with `promise`, or reject with `onTimeout()` once `ms` elapses.
 * The underlying operation is not cancelled; callers that care about a
 * late result must handle it inside `onTimeout`.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}
