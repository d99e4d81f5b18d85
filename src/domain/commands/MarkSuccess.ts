import { Command, type CommandContext } from "./Command.js";
import type { TimePoint } from "../typedefs.js";

export class MarkSuccess extends Command {
  readonly type = "MarkSuccess" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, logger }: CommandContext): Promise<void> {
    const state = engine.markSuccess();

    logger?.info("Word guessed", {
      type: this.type,
      word: state.guessedWords[state.guessedWords.length - 1],
      team: state.teams[state.currentTeamIndex],
      at: this.at,
    });

    if (state.gameEnded) {
      logger?.info("Game ended", { type: this.type, winner: state.winner, at: this.at });
    }
  }
}
