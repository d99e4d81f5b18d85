/**
 * Core domain typedefs used throughout the game. Names and time points are
 * plain aliases, not branded types.
 */

/** Display name of a team, unique within a game */
export type TeamName = string;

/** Absolute time point in milliseconds since Unix epoch */
export type TimePoint = number;

/** Derived lifecycle phase of a game */
export type GamePhase = "idle" | "countdown" | "active" | "ended";

export interface Team {
  readonly name: TeamName;
  readonly score: number;
}

/**
 * The single aggregate of a game session. Rules never mutate it; every
 * transition produces a new value.
 */
export interface GameState {
  /** Teams in rotation order */
  readonly teams: readonly Team[];

  /** Index into {@link teams} of the team currently describing */
  readonly currentTeamIndex: number;

  /** Word being described; empty before the first round starts */
  readonly currentWord: string;

  /** Words guessed during the current round only */
  readonly guessedWords: readonly string[];

  readonly roundTimeSeconds: number;

  /** Winning threshold; undefined when the game has no end */
  readonly maxPoints: number | undefined;

  /** When the active round began. Meaningful only while {@link gameStarted} */
  readonly roundStartedAt: TimePoint;

  /** True while a round's guessing phase is active */
  readonly gameStarted: boolean;

  /** True while the pre-round countdown is running */
  readonly countdownStarted: boolean;

  readonly countdownStartedAt: TimePoint;

  readonly gameEnded: boolean;

  readonly winner: TeamName | undefined;
}
