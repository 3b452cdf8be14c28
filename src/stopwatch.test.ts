import { describe, expect, it } from "vitest";
import { createStopwatch, elapsedMs, formatElapsed, pauseStopwatch, resetStopwatch, startStopwatch } from "./stopwatch";

describe("stopwatch", () => {
  it("measures a single interval", () => {
    const running = startStopwatch(createStopwatch(), 1000);
    const paused = pauseStopwatch(running, 2500);
    expect(elapsedMs(paused, 9000)).toBe(1500);
    expect(paused.running).toBe(false);
  });

  it("reads a running interval on demand", () => {
    const running = startStopwatch(createStopwatch(), 1000);
    expect(elapsedMs(running, 1750)).toBe(750);
  });

  it("accumulates across pauses", () => {
    let timer = startStopwatch(createStopwatch(), 0);
    timer = pauseStopwatch(timer, 1000);
    timer = startStopwatch(timer, 5000);
    timer = pauseStopwatch(timer, 5500);
    expect(elapsedMs(timer, 10000)).toBe(1500);
  });

  it("ignores start while running and pause while paused", () => {
    const running = startStopwatch(createStopwatch(), 0);
    expect(startStopwatch(running, 500)).toBe(running);
    const paused = pauseStopwatch(running, 1000);
    expect(pauseStopwatch(paused, 2000)).toBe(paused);
  });

  it("resets to zero", () => {
    const timer = resetStopwatch();
    expect(elapsedMs(timer, 5000)).toBe(0);
    expect(timer.running).toBe(false);
  });
});

describe("formatElapsed", () => {
  it("formats minutes, seconds and tenths", () => {
    expect(formatElapsed(0)).toBe("0:00.0");
    expect(formatElapsed(1500)).toBe("0:01.5");
    expect(formatElapsed(61234)).toBe("1:01.2");
  });
});
