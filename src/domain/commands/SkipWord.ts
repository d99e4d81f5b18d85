import { Command, type CommandContext } from "./Command.js";
import type { TimePoint } from "../typedefs.js";

export class SkipWord extends Command {
  readonly type = "SkipWord" as const;

  constructor(public readonly at: TimePoint) {
    super();
  }

  async execute({ engine, logger }: CommandContext): Promise<void> {
    engine.skip();
    logger?.info("Word skipped", { type: this.type, at: this.at });
  }
}
