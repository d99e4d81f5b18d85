import type { EventBus } from "./adapters/WebSocketBus.js";
import type {
  Command,
  CommandContext,
  GameEngine,
  GameSnapshot,
  GameState,
  TimePoint,
} from "./core.js";

export const GAME_CHANNEL = "game";

export type DispatchCommand = (command: Command, context: CommandContext) => Promise<void>;

export interface GameUpdatedEvent {
  readonly type: "GameUpdated";
  /** Command type that produced the update, or "Connected" for a fresh client */
  readonly cause: string;
  readonly at: TimePoint;
  readonly snapshot: GameSnapshot | null;
}

export function gameUpdated(
  engine: GameEngine,
  cause: string,
  at: TimePoint,
): GameUpdatedEvent {
  return {
    type: "GameUpdated",
    cause,
    at,
    snapshot: engine.hasGame ? engine.snapshot(at) : null,
  };
}

function currentState({ engine }: CommandContext): GameState | undefined {
  return engine.hasGame ? engine.state : undefined;
}

/**
 * Pushes the game snapshot to renderers after every command that applied.
 * The engine swaps its state only on an applied transition, so a rejected
 * command or an ignored timeout leaves the state identical and publishes
 * nothing.
 */
export function broadcastingDispatch(
  dispatch: DispatchCommand,
  bus: EventBus,
): DispatchCommand {
  return async (command, context) => {
    const before = currentState(context);
    await dispatch(command, context);
    if (currentState(context) === before) {
      return;
    }
    await bus.publish(GAME_CHANNEL, gameUpdated(context.engine, command.type, command.at));
  };
}
