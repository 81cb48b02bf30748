import { AdapterTimeoutError } from '@crosscheck/shared/src/utils/errors.js';

/** Clock and sleep, injectable so backoff and rate limiting can be tested without waiting. */
export interface Scheduler {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class AbortedError extends Error {
  constructor() {
    super('Operation aborted');
    this.name = 'AbortedError';
  }
}

export const systemScheduler: Scheduler = {
  now: () => Date.now(),
  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(new AbortedError());
        return;
      }
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      function onAbort(): void {
        clearTimeout(timer);
        reject(new AbortedError());
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  },
};

/**
 * Runs `fn` with a signal that aborts when `timeoutMs` elapses or `parent`
 * aborts. A timeout rejects with `AdapterTimeoutError` and a parent abort with
 * `AbortedError`, whether `fn` ignores the signal or rejects on it.
 */
export async function withTimeout<T>(
  sourceId: string,
  timeoutMs: number,
  parent: AbortSignal | undefined,
  fn: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;
  const onParentAbort = (): void => controller.abort();

  if (parent?.aborted) {
    throw new AbortedError();
  }
  parent?.addEventListener('abort', onParentAbort, { once: true });

  const expiry = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
      reject(new AdapterTimeoutError(sourceId, timeoutMs));
    }, timeoutMs);
  });
  const cancelled = new Promise<never>((_, reject) => {
    controller.signal.addEventListener('abort', () => {
      if (parent?.aborted) {
        reject(new AbortedError());
      }
    }, { once: true });
  });

  try {
    return await Promise.race([fn(controller.signal), expiry, cancelled]);
  } catch (error) {
    // an adapter that rejects on abort must not mask why the call was aborted
    if (timedOut) {
      throw new AdapterTimeoutError(sourceId, timeoutMs);
    }
    if (parent?.aborted) {
      throw new AbortedError();
    }
    throw error;
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);
  }
}
