import { describe, it, expect } from "vitest";

import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler.js";
import type { CountdownElapsed } from "../src/domain/commands/CountdownElapsed.js";

describe("InMemoryScheduler", () => {
  it("dispatches commands once their delay elapses", async () => {
    const dispatched: CountdownElapsed[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    await scheduler.scheduleTimeout("countdown", 3_000);

    await scheduler.runFor(2_999);
    expect(dispatched).toEqual([]);
    expect(scheduler.pending).toBe(1);

    await scheduler.runFor(1);
    expect(dispatched).toHaveLength(1);
    expect(dispatched[0]?.type).toBe("CountdownElapsed");
    expect(dispatched[0]?.at).toBe(3_000);
    expect(scheduler.pending).toBe(0);
    expect(scheduler.now).toBe(3_000);
  });

  it("counts from the configured start time", async () => {
    const dispatched: CountdownElapsed[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    }, 10_000);

    await scheduler.scheduleTimeout("countdown", 3_000);
    await scheduler.runFor(5_000);

    expect(dispatched.map((command) => command.at)).toEqual([13_000]);
    expect(scheduler.now).toBe(15_000);
  });

  it("replaces a pending timeout when the countdown is rescheduled", async () => {
    const dispatched: CountdownElapsed[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      dispatched.push(command);
    });

    await scheduler.scheduleTimeout("countdown", 3_000);
    await scheduler.runFor(1_000);
    await scheduler.scheduleTimeout("countdown", 3_000);

    await scheduler.runFor(5_000);
    expect(scheduler.pending).toBe(0);
    expect(dispatched.map((command) => command.at)).toEqual([4_000]);
  });

  it("processes follow-up timeouts scheduled during dispatch", async () => {
    const dispatched: number[] = [];
    const scheduler = new InMemoryScheduler(async (command) => {
      dispatched.push(command.at);
      if (dispatched.length < 3) {
        await scheduler.scheduleTimeout(command.phase, 500);
      }
    });

    await scheduler.scheduleTimeout("countdown", 1_000);

    await scheduler.runFor(5_000);
    expect(dispatched).toEqual([1_000, 1_500, 2_000]);
  });

  it("rejects negative delays and negative durations", async () => {
    const scheduler = new InMemoryScheduler(() => undefined);

    await expect(scheduler.scheduleTimeout("countdown", -1)).rejects.toThrow(
      "Timeout delay must be non-negative",
    );
    await expect(scheduler.runFor(-1)).rejects.toThrow(
      "Cannot run scheduler backwards in time",
    );
  });
});
