import { Command, type CommandContext } from "./Command.js";
import type { TimePoint } from "../typedefs.js";

export class StartRound extends Command {
  readonly type = "StartRound" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, logger }: CommandContext): Promise<void> {
    const state = engine.startRound(this.at);

    logger?.info("Round started", {
      type: this.type,
      team: state.teams[state.currentTeamIndex]?.name,
      roundTimeSeconds: state.roundTimeSeconds,
      at: this.at,
    });
  }
}
