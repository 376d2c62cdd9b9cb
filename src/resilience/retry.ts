import { ResilienceClock, RetryPolicy } from './types';

/**
 * Delay before retry number `attempt` (1 = delay after the first failure).
 * Exponential growth capped at maxDelayMs, with "equal jitter": half the delay
 * is fixed, the other half random, so retries from many workers spread out.
 */
export function backoffDelay(policy: RetryPolicy, attempt: number, random: () => number): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(policy.maxDelayMs, exponential);
  const half = capped / 2;
  return Math.round(half + random() * half);
}

/** Sleep that rejects with the signal's reason as soon as the signal aborts */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export const systemClock: ResilienceClock = {
  now: () => Date.now(),
  sleep: abortableSleep,
  random: () => Math.random(),
};
