// packages/core/src/engine/waiter.ts — Backoff waits

/**
 * Suspends for `seconds`, calling `onTick` with the seconds remaining at the
 * start of each second.
 */
export type Waiter = (seconds: number, onTick: (remainingSeconds: number) => void) => Promise<void>;

/** Promise-based delay. */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createCountdownWaiter(delay: (ms: number) => Promise<void> = sleep): Waiter {
  return async (seconds, onTick) => {
    for (let remaining = seconds; remaining > 0; remaining--) {
      onTick(remaining);
      await delay(1000);
    }
  };
}
