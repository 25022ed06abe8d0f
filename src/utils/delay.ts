/**
 * Suspend for `delayMs`. Resolves early, without error, when `signal` aborts.
 */
export function sleep(delayMs: number, signal?: AbortSignal): Promise<void> {
  if (delayMs <= 0 || signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export type Sleep = (delayMs: number, signal?: AbortSignal) => Promise<void>;

/**
 * Base delay plus uniform random jitter in `[0, jitterMs)`.
 *
 * @param random - Source of uniform values in `[0, 1)`.
 */
export function jittered(baseMs: number, jitterMs: number, random: () => number = Math.random): number {
  return Math.round(baseMs + random() * jitterMs);
}
