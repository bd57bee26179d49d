export type SleepResult = 'elapsed' | 'cancelled';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<SleepResult>;

/**
 * Wait for `ms`, resolving early with 'cancelled' when the signal fires
 */
export const sleep: Sleeper = (ms, signal) => {
  if (signal?.aborted) {
    return Promise.resolve('cancelled');
  }

  return new Promise(resolve => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve('cancelled');
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve('elapsed');
    }, Math.max(0, ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
};
