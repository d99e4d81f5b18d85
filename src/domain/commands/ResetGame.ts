import { Command, type CommandContext } from "./Command.js";
import type { TimePoint } from "../typedefs.js";

export class ResetGame extends Command {
  readonly type = "ResetGame" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, logger }: CommandContext): Promise<void> {
    const hadGame = engine.hasGame;
    engine.reset();

    logger?.info(hadGame ? "Game reset" : "Reset ignored; no game in progress", {
      type: this.type,
      at: this.at,
    });
  }
}
