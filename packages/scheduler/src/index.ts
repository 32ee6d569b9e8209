export {
  PostingScheduler,
  type ContentSource,
  type SchedulerSettings,
  type SchedulerOptions,
  type SchedulerState,
  type SchedulerStatus,
} from "./scheduler.js";
export { SystemClock, repeating, type Clock, type TimerHandle } from "./clock.js";
export { ManualClock } from "./manual-clock.js";
export {
  computePostingInterval,
  drawIntervalMinutes,
  msUntilNextDaily,
  type PostingInterval,
} from "./intervals.js";
export { SerialQueue } from "./serial-queue.js";
