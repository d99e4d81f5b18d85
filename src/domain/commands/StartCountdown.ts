import { Command, type CommandContext } from "./Command.js";
import { COUNTDOWN_SECONDS } from "../GameConfig.js";
import type { TimePoint } from "../typedefs.js";

export class StartCountdown extends Command {
  readonly type = "StartCountdown" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, scheduler, logger }: CommandContext): Promise<void> {
    const state = engine.startCountdown(this.at);

    await scheduler.scheduleTimeout("countdown", COUNTDOWN_SECONDS * 1000);

    logger?.info("Countdown started", {
      type: this.type,
      team: state.teams[state.currentTeamIndex]?.name,
      at: this.at,
    });
  }
}
