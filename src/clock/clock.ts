export type TimerCallback = () => Promise<void> | void;

export interface TimerHandle {
  cancel(): void;
}

/**
 * Source of "now" and of delayed callbacks. Everything time-dependent in the
 * engine goes through this so tests can drive time by hand.
 */
export interface Clock {
  now(): Date;
  setTimer(delayMs: number, callback: TimerCallback): TimerHandle;
}

// setTimeout overflows above this and fires immediately
const MAX_TIMEOUT_MS = 2_147_483_647;

export const systemClock: Clock = {
  now: () => new Date(),
  setTimer(delayMs, callback) {
    const timeout = setTimeout(() => {
      Promise.resolve()
        .then(callback)
        .catch((error: unknown) => {
          console.error('❌ Timer callback failed:', error);
        });
    }, Math.min(Math.max(0, delayMs), MAX_TIMEOUT_MS));

    return {
      cancel: () => clearTimeout(timeout),
    };
  },
};
