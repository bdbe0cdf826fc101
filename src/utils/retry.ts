export type BackoffOptions = {
  baseDelayMs?: number;
  maxDelayMs?: number;
};

const DEFAULTS: Required<BackoffOptions> = {
  baseDelayMs: 500,
  maxDelayMs: 30_000,
};

/**
 * Bounded exponential backoff: base * 2^(attempt-1), capped at maxDelayMs.
 * `attempt` is 1-based; attempt 0 or below means no wait.
 */
export function backoffDelay(attempt: number, opts?: BackoffOptions): number {
  const { baseDelayMs, maxDelayMs } = { ...DEFAULTS, ...opts };
  if (attempt <= 0) return 0;
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Race `work` against an abort signal. The work itself is expected to honour
 * the signal too; this only stops the caller from waiting on one that doesn't.
 */
export function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason);
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(err);
      },
    );
  });
}
