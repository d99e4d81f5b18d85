import { Command, type CommandContext } from "./Command.js";
import type { TimePoint } from "../typedefs.js";

export class MarkEnemyGuessed extends Command {
  readonly type = "MarkEnemyGuessed" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, logger }: CommandContext): Promise<void> {
    const state = engine.markEnemyGuessed(this.at);
    const enemy = state.teams[(state.currentTeamIndex + 1) % state.teams.length];

    logger?.info("Enemy team awarded the last word", {
      type: this.type,
      team: enemy,
      at: this.at,
    });
  }
}
