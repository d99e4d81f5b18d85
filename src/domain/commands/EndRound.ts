import { Command, type CommandContext } from "./Command.js";
import type { TimePoint } from "../typedefs.js";

export class EndRound extends Command {
  readonly type = "EndRound" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, logger }: CommandContext): Promise<void> {
    const endedEarly = engine.phase === "countdown" || !engine.isRoundFinished(this.at);
    const state = engine.endRound();

    logger?.info("Round ended", {
      type: this.type,
      endedEarly,
      nextTeam: state.teams[state.currentTeamIndex]?.name,
      at: this.at,
    });
  }
}
