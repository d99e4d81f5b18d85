import type { GamePhase } from "../typedefs.js";

export class IllegalTransitionError extends Error {
  constructor(
    public readonly action: string,
    public readonly phase: GamePhase,
  ) {
    super(`Cannot ${action} while the game is ${phase}`);
    this.name = "IllegalTransitionError";
  }
}
