import { Command, type CommandContext } from "./Command.js";
import type { TimePoint } from "../typedefs.js";

/**
 * Delivered by the scheduler once the countdown should be over. Starts the
 * round unless the game has moved on (aborted, started by hand, or a newer
 * countdown that is still running).
 */
export class CountdownElapsed extends Command {
  readonly type = "CountdownElapsed" as const;
  readonly phase = "countdown" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, logger }: CommandContext): Promise<void> {
    if (!engine.hasGame || engine.phase !== this.phase) {
      logger?.debug("Countdown timeout ignored; no countdown running", {
        type: this.type,
        at: this.at,
      });
      return;
    }

    if (!engine.isCountdownFinished(this.at)) {
      logger?.debug("Countdown timeout ignored; countdown still running", {
        type: this.type,
        remaining: engine.countdownRemaining(this.at),
        at: this.at,
      });
      return;
    }

    const state = engine.startRound(this.at);

    logger?.info("Countdown elapsed; round started", {
      type: this.type,
      team: state.teams[state.currentTeamIndex]?.name,
      at: this.at,
    });
  }
}
