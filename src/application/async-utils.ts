/**
 * Sleeps for `ms`, resolving early (never rejecting) when `signal` aborts.
 * Used for every wait that must stay responsive to shutdown.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.resolve();

  return new Promise((resolve) => {
    const done = (): void => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener('abort', done, { once: true });
  });
}

export class TimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Races `work` against a deadline. On expiry the controller passed to
 * `work` is aborted and a TimeoutError is thrown; the abandoned promise
 * keeps running but its outcome is ignored.
 */
export async function withTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  const ac = new AbortController();
  const forwardAbort = (): void => ac.abort(parent?.reason);
  if (parent?.aborted) ac.abort(parent.reason);
  else parent?.addEventListener('abort', forwardAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TimeoutError(timeoutMs);
      ac.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    return await Promise.race([work(ac.signal), deadline]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', forwardAbort);
  }
}

export class ShutdownError extends Error {
  constructor() {
    super('Shutdown requested');
    this.name = 'ShutdownError';
  }
}

/**
 * Settles with `work`, or rejects with a ShutdownError as soon as `signal`
 * aborts. The abandoned promise keeps running; its outcome is ignored.
 */
export function raceShutdown<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (signal === undefined) return work;

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new ShutdownError());
    if (signal.aborted) onAbort();
    else signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
