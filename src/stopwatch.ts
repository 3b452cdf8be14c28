import { Stopwatch } from "./types";

export function createStopwatch(): Stopwatch {
  return { running: false, startedAt: null, elapsedMs: 0 };
}

export function startStopwatch(timer: Stopwatch, now: number): Stopwatch {
  if (timer.running) return timer;
  return { ...timer, running: true, startedAt: now };
}

export function pauseStopwatch(timer: Stopwatch, now: number): Stopwatch {
  if (!timer.running || timer.startedAt === null) return timer;
  return {
    running: false,
    startedAt: null,
    elapsedMs: timer.elapsedMs + Math.max(0, now - timer.startedAt),
  };
}

export function resetStopwatch(): Stopwatch {
  return createStopwatch();
}

export function elapsedMs(timer: Stopwatch, now: number): number {
  if (!timer.running || timer.startedAt === null) return timer.elapsedMs;
  return timer.elapsedMs + Math.max(0, now - timer.startedAt);
}

// m:ss.t
export function formatElapsed(ms: number): string {
  const tenths = Math.floor(Math.max(0, ms) / 100);
  const minutes = Math.floor(tenths / 600);
  const seconds = Math.floor((tenths % 600) / 10);
  return `${minutes}:${String(seconds).padStart(2, "0")}.${tenths % 10}`;
}
