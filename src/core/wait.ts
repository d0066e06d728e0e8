/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const sleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  if (ms <= 0 || signal?.aborted) {
    return;
  }

  await new Promise<void>((resolve) => {
    const onAbort = (): void => {
      clearTimeout(handle);
      resolve();
    };

    const handle = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
};

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;
