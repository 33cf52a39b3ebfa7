import { describe, it, expect } from "vitest";
import { ManualClock, systemClock } from "../clock";
import { CancelledError } from "../errors";

describe("ManualClock", () => {
  it("fires delays in due order as time advances", async () => {
    const clock = new ManualClock(100);
    const fired: string[] = [];
    void clock.delay(300).then(() => fired.push(`b@${clock.now()}`));
    void clock.delay(100).then(() => fired.push(`a@${clock.now()}`));

    await clock.advance(150);
    expect(fired).toEqual(["a@200"]);

    await clock.advance(1000);
    expect(fired).toEqual(["a@200", "b@400"]);
    expect(clock.now()).toBe(1250);
  });

  it("fires follow-up delays scheduled inside the same span", async () => {
    const clock = new ManualClock();
    const fired: number[] = [];
    void clock
      .delay(10)
      .then(() => clock.delay(10))
      .then(() => fired.push(clock.now()));

    await clock.advance(50);
    expect(fired).toEqual([20]);
  });

  it("rejects and forgets a cancelled delay", async () => {
    const clock = new ManualClock();
    const controller = new AbortController();
    const pending = clock.delay(100, controller.signal);

    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
    expect(clock.pendingTimers).toBe(0);
    await expect(clock.delay(5, controller.signal)).rejects.toBeInstanceOf(CancelledError);
  });

  it("derives wall time from its origin", () => {
    const clock = new ManualClock(2500, Date.UTC(2024, 0, 1));
    expect(new Date(clock.wallTime()).toISOString()).toBe("2024-01-01T00:00:02.500Z");
  });
});

describe("systemClock", () => {
  it("cancels a real delay", async () => {
    const controller = new AbortController();
    const pending = systemClock.delay(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
