/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import { CountdownElapsed } from "../../domain/commands/CountdownElapsed.js";
import type { Scheduler } from "../../domain/ports/Scheduler.js";
import type { TimePoint } from "../../domain/typedefs.js";

interface SchedulerState {
  readonly now: TimePoint;
  readonly queue: readonly CountdownElapsed[];
}

/**
 * Scheduler for tests: keeps pending countdown timeouts on a virtual clock
 * that only moves when {@link runFor} is called.
 */
export class InMemoryScheduler implements Scheduler {
  readonly #dispatch: (command: CountdownElapsed) => Promise<void> | void;
  #state: SchedulerState;

  constructor(
    dispatch: (command: CountdownElapsed) => Promise<void> | void,
    startAt: TimePoint = 0,
  ) {
    this.#dispatch = dispatch;
    this.#state = { now: startAt, queue: [] };
  }

  get now(): TimePoint {
    return this.#state.now;
  }

  get pending(): number {
    return this.#state.queue.length;
  }

  async scheduleTimeout(
    phase: CountdownElapsed["phase"],
    delayMs: number,
  ): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    // One pending timeout per phase: a reschedule replaces the earlier one.
    const others = this.#state.queue.filter((existing) => existing.phase !== phase);
    const command = new CountdownElapsed(this.#state.now + delayMs);
    const insertAt = others.findIndex((existing) => existing.at > command.at);
    const queue =
      insertAt === -1
        ? [...others, command]
        : [...others.slice(0, insertAt), command, ...others.slice(insertAt)];

    this.#state = { ...this.#state, queue };
  }

  async runFor(milliseconds: number): Promise<void> {
    if (milliseconds < 0) {
      throw new Error("Cannot run scheduler backwards in time");
    }

    const targetTime = this.#state.now + milliseconds;
    let state = this.#state;

    while (state.queue.length > 0) {
      const [next, ...remaining] = state.queue;
      if (!next) {
        break;
      }
      if (next.at > targetTime) {
        break;
      }

      state = { now: next.at, queue: remaining };
      this.#state = state;
      await this.#dispatch(next);
      state = this.#state;
    }

    this.#state = { now: targetTime, queue: state.queue };
  }
}
