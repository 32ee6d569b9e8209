import { repeating, type Clock, type TimerHandle } from "./clock.js";
import { msUntilNextDaily } from "./intervals.js";

interface PendingTimer {
  id: number;
  due: number;
  callback: () => void;
}

/**
 * A clock that only moves when told to. Timers fire synchronously inside
 * advance(), in due order, with now() set to their due time.
 */
export class ManualClock implements Clock {
  private current: number;
  private timers: PendingTimer[] = [];
  private nextId = 0;

  constructor(start: Date) {
    this.current = start.getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  after(ms: number, callback: () => void): TimerHandle {
    const timer: PendingTimer = {
      id: this.nextId++,
      due: this.current + Math.max(0, ms),
      callback,
    };
    this.timers.push(timer);
    return { cancel: () => this.remove(timer.id) };
  }

  dailyAt(hour: number, minute: number, callback: () => void): TimerHandle {
    return repeating(this, () => msUntilNextDaily(this.now(), hour, minute), callback);
  }

  advance(ms: number): void {
    const target = this.current + ms;

    for (;;) {
      const next = this.earliestDue(target);
      if (!next) break;

      this.remove(next.id);
      this.current = next.due;
      next.callback();
    }

    this.current = target;
  }

  get pendingTimers(): number {
    return this.timers.length;
  }

  private earliestDue(limit: number): PendingTimer | undefined {
    let earliest: PendingTimer | undefined;
    for (const timer of this.timers) {
      if (timer.due > limit) continue;
      if (!earliest || timer.due < earliest.due) earliest = timer;
    }
    return earliest;
  }

  private remove(id: number): void {
    this.timers = this.timers.filter((t) => t.id !== id);
  }
}
