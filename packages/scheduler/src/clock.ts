import cron from "node-cron";

export interface TimerHandle {
  cancel(): void;
}

/**
 * Source of time and timers for the scheduler.
 */
export interface Clock {
  now(): Date;
  after(ms: number, callback: () => void): TimerHandle;
  /** Fire every day at the given local time. */
  dailyAt(hour: number, minute: number, callback: () => void): TimerHandle;
}

/**
 * Re-arm a one-shot timer after each firing, asking for a fresh delay
 * every time.
 */
export function repeating(
  clock: Pick<Clock, "after">,
  nextDelayMs: () => number,
  callback: () => void
): TimerHandle {
  let current: TimerHandle | null = null;
  let cancelled = false;

  const arm = (): void => {
    current = clock.after(nextDelayMs(), () => {
      if (cancelled) return;
      arm();
      callback();
    });
  };
  arm();

  return {
    cancel: () => {
      cancelled = true;
      current?.cancel();
    },
  };
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  after(ms: number, callback: () => void): TimerHandle {
    const timer = setTimeout(callback, ms);
    return { cancel: () => clearTimeout(timer) };
  }

  dailyAt(hour: number, minute: number, callback: () => void): TimerHandle {
    const expression = `${minute} ${hour} * * *`;
    if (!cron.validate(expression)) {
      throw new Error(`Invalid daily schedule: ${expression}`);
    }

    const task = cron.schedule(expression, () => callback());
    return { cancel: () => task.stop() };
  }
}
