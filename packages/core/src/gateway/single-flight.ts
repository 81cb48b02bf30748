import { AbortedError } from './scheduler.js';

interface Flight<T> {
  readonly promise: Promise<T>;
  readonly controller: AbortController;
  waiters: number;
  pinned: boolean;
}

/**
 * Collapses concurrent calls for the same key into one execution. Every
 * caller receives the same settled value. A caller's signal detaches only
 * that caller; the shared execution is aborted once every caller has
 * detached.
 */
export class SingleFlight<T> {
  private readonly inflight = new Map<string, Flight<T>>();

  get size(): number {
    return this.inflight.size;
  }

  run(key: string, fn: (signal: AbortSignal) => Promise<T>, signal?: AbortSignal): Promise<T> {
    let flight = this.inflight.get(key);
    if (!flight) {
      const controller = new AbortController();
      const promise = fn(controller.signal).finally(() => {
        this.inflight.delete(key);
      });
      flight = { promise, controller, waiters: 0, pinned: false };
      this.inflight.set(key, flight);
    }

    if (!signal) {
      flight.pinned = true;
      return flight.promise;
    }

    return this.attach(flight, signal);
  }

  private attach(flight: Flight<T>, signal: AbortSignal): Promise<T> {
    flight.waiters++;

    const detach = (): void => {
      flight.waiters--;
      if (flight.waiters === 0 && !flight.pinned) {
        flight.controller.abort();
      }
    };

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        detach();
        reject(new AbortedError());
      };

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }

      flight.promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }
}
