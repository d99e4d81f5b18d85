import type { GameState } from "../typedefs.js";

export class InvalidGameStateError extends Error {
  constructor(
    public readonly reason: string,
    public readonly state: GameState,
  ) {
    super(`Invalid game state: ${reason}`);
    this.name = "InvalidGameStateError";
  }
}
