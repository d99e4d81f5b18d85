/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { CommandContext, Logger, Scheduler } from "../core.js";
import { CountdownElapsed, dispatchCommand } from "../core.js";

interface RealSchedulerOptions {
  readonly dispatch?: typeof dispatchCommand;
  readonly contextFactory: () => Promise<CommandContext>;
  readonly logger?: Logger;
}

type Phase = CountdownElapsed["phase"];

export class RealScheduler implements Scheduler {
  #timers: Map<Phase, ReturnType<typeof setTimeout>> = new Map();
  readonly #dispatch: typeof dispatchCommand;
  readonly #contextFactory: RealSchedulerOptions["contextFactory"];
  readonly #logger: Logger | undefined;

  constructor(options: RealSchedulerOptions) {
    this.#dispatch = options.dispatch ?? dispatchCommand;
    this.#contextFactory = options.contextFactory;
    this.#logger = options.logger;
  }

  async scheduleTimeout(phase: Phase, delayMs: number): Promise<void> {
    if (delayMs < 0) {
      throw new Error("Timeout delay must be non-negative");
    }

    const existing = this.#timers.get(phase);
    if (existing) {
      clearTimeout(existing);
      this.#timers.delete(phase);
      this.#logger?.warn("Rescheduling timeout", { phase, delayMs });
    }

    const timer = setTimeout(async () => {
      this.#timers.delete(phase);
      try {
        const context = await this.#contextFactory();
        await this.#dispatch(new CountdownElapsed(Date.now()), context);
      } catch (error) {
        this.#logger?.error("Failed to dispatch scheduled timeout", {
          phase,
          error,
        });
      }
    }, delayMs);

    this.#timers.set(phase, timer);
    this.#logger?.info("Timeout scheduled", { phase, delayMs });
  }

  /** Drops every pending timer, e.g. on shutdown. */
  cancelAll(): void {
    for (const timer of this.#timers.values()) {
      clearTimeout(timer);
    }
    this.#timers.clear();
  }
}
