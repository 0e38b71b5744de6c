/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async delay utility for pagepulse.
 */

/**
 * Creates a promise that resolves after the specified delay. When an abort signal is supplied, the promise resolves early as soon as the signal fires, so a
 * cancelled run does not sit out the remainder of a retry wait. Callers check signal.aborted afterwards to tell the two cases apart.
 * @param ms - The delay duration in milliseconds.
 * @param signal - Optional signal that ends the wait early.
 * @returns A promise that resolves after the delay or on abort, whichever comes first.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {

  if(signal?.aborted) {

    return;
  }

  return new Promise<void>((resolve) => {

    const onAbort = (): void => {

      clearTimeout(timer);
      resolve();
    };

    const timer = setTimeout(() => {

      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
