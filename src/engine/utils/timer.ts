import type { DelayTimer, TickDelta } from "../types";

export function startTimer(ticks: TickDelta): DelayTimer {
  return { remaining: ticks, total: ticks };
}

/** One tick of countdown. Never goes below zero. */
export function countDown(timer: DelayTimer): DelayTimer {
  return { ...timer, remaining: Math.max(0, timer.remaining - 1) };
}

export function isElapsed(timer: DelayTimer): boolean {
  return timer.remaining <= 0;
}

/** Elapsed fraction in [0, 1]; 0 when there is no timer. */
export function timerProgress(timer: DelayTimer | null): number {
  if (timer === null || timer.total <= 0) return 0;
  return (timer.total - timer.remaining) / timer.total;
}
