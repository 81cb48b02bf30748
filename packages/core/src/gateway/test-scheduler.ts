import type { Scheduler } from './scheduler.js';
import { AbortedError } from './scheduler.js';

export interface ManualScheduler extends Scheduler {
  readonly sleeps: readonly number[];
  advance(ms: number): void;
}

/** Scheduler whose sleeps complete immediately and move the clock forward. */
export function createManualScheduler(start = 0): ManualScheduler {
  let current = start;
  const sleeps: number[] = [];

  return {
    sleeps,
    now: () => current,
    advance(ms: number): void {
      current += ms;
    },
    sleep(ms: number, signal?: AbortSignal): Promise<void> {
      if (signal?.aborted) {
        return Promise.reject(new AbortedError());
      }
      sleeps.push(ms);
      current += ms;
      return Promise.resolve();
    },
  };
}
