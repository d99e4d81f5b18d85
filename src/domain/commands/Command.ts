import type { GameEngine } from "../GameEngine.js";
import type { Logger } from "../ports/Logger.js";
import type { Scheduler } from "../ports/Scheduler.js";
import type { TimePoint } from "../typedefs.js";

export interface CommandContext {
  readonly engine: GameEngine;
  readonly scheduler: Scheduler;
  readonly logger?: Logger | undefined;
}

export abstract class Command {
  abstract readonly type: string;
  abstract readonly at: TimePoint;
  abstract execute(ctx: CommandContext): Promise<void>;
}
