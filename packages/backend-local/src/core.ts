export type {
  Command,
  CommandContext,
} from "@alias-party/core/domain/commands/Command.js";
export { CountdownElapsed } from "@alias-party/core/domain/commands/CountdownElapsed.js";
export { CreateGame } from "@alias-party/core/domain/commands/CreateGame.js";
export { EndRound } from "@alias-party/core/domain/commands/EndRound.js";
export { MarkEnemyGuessed } from "@alias-party/core/domain/commands/MarkEnemyGuessed.js";
export { MarkSuccess } from "@alias-party/core/domain/commands/MarkSuccess.js";
export { ResetGame } from "@alias-party/core/domain/commands/ResetGame.js";
export { SkipWord } from "@alias-party/core/domain/commands/SkipWord.js";
export { StartCountdown } from "@alias-party/core/domain/commands/StartCountdown.js";
export { StartRound } from "@alias-party/core/domain/commands/StartRound.js";
export { dispatchCommand } from "@alias-party/core/domain/commands/dispatchCommand.js";
export type { GameSnapshot } from "@alias-party/core/domain/entities/GameRules.js";
export { mulberry32 } from "@alias-party/core/domain/entities/random.js";
export {
  IllegalTransitionError,
  InvalidConfigurationError,
  NoActiveGameError,
} from "@alias-party/core/domain/errors/index.js";
export { GameEngine } from "@alias-party/core/domain/GameEngine.js";
export type { GameConfig } from "@alias-party/core/domain/GameConfig.js";
export {
  ROUND_TIME_RANGE,
  createGameConfig,
} from "@alias-party/core/domain/GameConfig.js";
export type { Logger } from "@alias-party/core/domain/ports/Logger.js";
export type { Scheduler } from "@alias-party/core/domain/ports/Scheduler.js";
export type { WordSource } from "@alias-party/core/domain/ports/WordSource.js";
export type { GameState, TeamName, TimePoint } from "@alias-party/core/domain/typedefs.js";
export { createWordSource } from "@alias-party/core/adapters/words/createWordSource.js";
