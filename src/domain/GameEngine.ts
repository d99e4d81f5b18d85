import {
  assertValidGameState,
  countdownRemaining,
  describeGame,
  endRound,
  initializeGame,
  isCountdownFinished,
  isRoundFinished,
  leaderboard,
  markEnemyGuessed,
  markSuccess,
  phaseOf,
  remainingTime,
  skip,
  startCountdown,
  startRound,
  type GameSnapshot,
  type InitializeGameOptions,
} from "./entities/GameRules.js";
import { NoActiveGameError } from "./errors/index.js";
import type { Logger } from "./ports/Logger.js";
import type { WordSource } from "./ports/WordSource.js";
import type { GamePhase, GameState, Team, TeamName, TimePoint } from "./typedefs.js";

export interface GameEngineOptions {
  readonly words: WordSource;
  readonly logger?: Logger | undefined;
}

/**
 * Owns the state of one game session. Each transition computes the next
 * state from the rules and swaps it in only when the rules and the invariant
 * check both succeed, so a failed call leaves the previous state in place.
 *
 * The engine never samples a clock; callers pass `now` to everything that
 * depends on time.
 */
export class GameEngine {
  readonly #words: WordSource;
  readonly #logger: Logger | undefined;
  #state: GameState | undefined;

  constructor({ words, logger }: GameEngineOptions) {
    this.#words = words;
    this.#logger = logger;
  }

  get hasGame(): boolean {
    return this.#state !== undefined;
  }

  get state(): GameState {
    return this.#current();
  }

  get phase(): GamePhase {
    return phaseOf(this.#current());
  }

  initialize(teamNames: readonly TeamName[], options: InitializeGameOptions): GameState {
    const state = initializeGame(teamNames, options);
    assertValidGameState(state);
    this.#state = state;
    this.#logger?.info("Game initialized", {
      teams: state.teams.map((team) => team.name),
      roundTimeSeconds: state.roundTimeSeconds,
      maxPoints: state.maxPoints,
    });
    return state;
  }

  reset(): void {
    this.#state = undefined;
    this.#logger?.info("Game reset");
  }

  startCountdown(now: TimePoint): GameState {
    return this.#apply((state) => startCountdown(state, now));
  }

  startRound(now: TimePoint): GameState {
    const state = this.#apply((current) => startRound(current, now, this.#words));
    this.#logger?.debug("Round started", {
      team: state.teams[state.currentTeamIndex]?.name,
      at: now,
    });
    return state;
  }

  markSuccess(): GameState {
    const state = this.#apply((current) => markSuccess(current, this.#words));
    if (state.gameEnded) {
      this.#logger?.info("Game won", { winner: state.winner });
    }
    return state;
  }

  skip(): GameState {
    return this.#apply((state) => skip(state, this.#words));
  }

  markEnemyGuessed(now: TimePoint): GameState {
    return this.#apply((state) => markEnemyGuessed(state, now));
  }

  endRound(): GameState {
    const state = this.#apply(endRound);
    this.#logger?.debug("Round ended", {
      nextTeam: state.teams[state.currentTeamIndex]?.name,
    });
    return state;
  }

  remainingTime(now: TimePoint): number {
    return remainingTime(this.#current(), now);
  }

  countdownRemaining(now: TimePoint): number {
    return countdownRemaining(this.#current(), now);
  }

  isRoundFinished(now: TimePoint): boolean {
    return isRoundFinished(this.#current(), now);
  }

  isCountdownFinished(now: TimePoint): boolean {
    return isCountdownFinished(this.#current(), now);
  }

  leaderboard(): Team[] {
    return leaderboard(this.#current().teams);
  }

  snapshot(now: TimePoint): GameSnapshot {
    return describeGame(this.#current(), now);
  }

  #current(): GameState {
    if (!this.#state) {
      throw new NoActiveGameError();
    }
    return this.#state;
  }

  #apply(transition: (state: GameState) => GameState): GameState {
    const next = transition(this.#current());
    assertValidGameState(next);
    this.#state = next;
    return next;
  }
}
