import { setTimeout as sleep } from "timers/promises";
import type { DelayFn, TimerService } from "../ports/timer.js";

export const realTimerService: TimerService = {
  setTimeout: (fn, ms) => setTimeout(fn, ms),
  clearTimeout: (id) => clearTimeout(id),
};

export const realDelay: DelayFn = async (ms) => {
  await sleep(ms);
};
