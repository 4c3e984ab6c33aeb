import type { Clock, TimerCallback, TimerHandle } from './clock.js';

interface ScheduledTimer {
  id: number;
  at: number;
  callback: TimerCallback;
}

/**
 * Clock that only moves when told to. Due callbacks fire in time order
 * (then registration order) and are awaited one by one.
 */
export class ManualClock implements Clock {
  private current: number;
  private sequence = 0;
  private readonly timers = new Map<number, ScheduledTimer>();

  constructor(start: Date = new Date(0)) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  setTimer(delayMs: number, callback: TimerCallback): TimerHandle {
    const id = ++this.sequence;
    this.timers.set(id, {
      id,
      at: this.current + Math.max(0, delayMs),
      callback,
    });
    return {
      cancel: () => {
        this.timers.delete(id);
      },
    };
  }

  get pendingTimerCount(): number {
    return this.timers.size;
  }

  async advanceBy(ms: number): Promise<void> {
    const target = this.current + ms;

    for (;;) {
      const next = this.nextDue(target);
      if (!next) break;
      this.timers.delete(next.id);
      this.current = Math.max(this.current, next.at);
      await next.callback();
    }

    this.current = Math.max(this.current, target);
  }

  async advanceTo(at: Date): Promise<void> {
    await this.advanceBy(at.getTime() - this.current);
  }

  private nextDue(limit: number): ScheduledTimer | undefined {
    let best: ScheduledTimer | undefined;
    for (const timer of this.timers.values()) {
      if (timer.at > limit) continue;
      const earlier =
        !best ||
        timer.at < best.at ||
        (timer.at === best.at && timer.id < best.id);
      if (earlier) best = timer;
    }
    return best;
  }
}
