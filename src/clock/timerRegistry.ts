import type { Clock, TimerCallback, TimerHandle } from './clock.js';

/**
 * Keyed timers: arming a key cancels whatever was armed under it before, so
 * re-scheduling never stacks callbacks.
 */
export class TimerRegistry {
  private readonly handles = new Map<string, TimerHandle>();

  constructor(private readonly clock: Clock) {}

  armAt(key: string, at: Date, callback: TimerCallback): void {
    this.cancel(key);

    const delayMs = Math.max(0, at.getTime() - this.clock.now().getTime());
    const handle = this.clock.setTimer(delayMs, async () => {
      if (this.handles.get(key) === handle) {
        this.handles.delete(key);
      }
      await callback();
    });

    this.handles.set(key, handle);
  }

  cancel(key: string): void {
    const handle = this.handles.get(key);
    if (!handle) return;
    handle.cancel();
    this.handles.delete(key);
  }

  has(key: string): boolean {
    return this.handles.has(key);
  }

  get size(): number {
    return this.handles.size;
  }

  cancelAll(): void {
    for (const handle of this.handles.values()) handle.cancel();
    this.handles.clear();
  }
}
