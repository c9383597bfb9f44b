import { describe, it, expect } from "vitest";
import { MAX_TIMER_DELAY_MS, timerDelay } from "./timers.js";

describe("timerDelay", () => {
  it("passes ordinary delays through", () => {
    expect(timerDelay(30000)).toBe(30000);
  });

  it("clamps to the range setTimeout honours", () => {
    expect(timerDelay(MAX_TIMER_DELAY_MS * 10)).toBe(MAX_TIMER_DELAY_MS);
    expect(timerDelay(-5)).toBe(0);
  });
});
