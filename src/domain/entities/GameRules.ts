import { COUNTDOWN_SECONDS, MAX_TEAMS, MIN_TEAMS } from "../GameConfig.js";
import {
  IllegalTransitionError,
  InvalidConfigurationError,
  InvalidGameStateError,
} from "../errors/index.js";
import type { WordSource } from "../ports/WordSource.js";
import type {
  GamePhase,
  GameState,
  Team,
  TeamName,
  TimePoint,
} from "../typedefs.js";

export interface InitializeGameOptions {
  readonly roundTimeSeconds: number;
  readonly maxPoints?: number | undefined;
}

/** Renderer-facing view of a game at one observation point */
export interface GameSnapshot {
  readonly phase: GamePhase;
  readonly teams: readonly Team[];
  readonly currentTeam: Team;
  readonly currentWord: string;
  readonly guessedWords: readonly string[];
  readonly roundTimeSeconds: number;
  readonly maxPoints: number | undefined;
  readonly remainingSeconds: number;
  readonly countdown: number;
  readonly roundFinished: boolean;
  readonly countdownFinished: boolean;
  readonly leaderboard: readonly Team[];
  readonly winner: TeamName | undefined;
}

function elapsedSeconds(from: TimePoint, now: TimePoint): number {
  return Math.floor((now - from) / 1000);
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function ensurePhase(
  state: GameState,
  action: string,
  allowed: readonly GamePhase[],
): void {
  const phase = phaseOf(state);
  if (!allowed.includes(phase)) {
    throw new IllegalTransitionError(action, phase);
  }
}

function awardPoint(teams: readonly Team[], index: number): Team[] {
  return teams.map((team, i) => (i === index ? { ...team, score: team.score + 1 } : team));
}

export function phaseOf(state: GameState): GamePhase {
  if (state.gameEnded) return "ended";
  if (state.gameStarted) return "active";
  if (state.countdownStarted) return "countdown";
  return "idle";
}

export function currentTeam(state: GameState): Team {
  const team = state.teams[state.currentTeamIndex];
  if (!team) {
    throw new InvalidGameStateError("current team index out of range", state);
  }
  return team;
}

export function validateTeamNames(teamNames: readonly TeamName[]): string[] {
  const issues: string[] = [];

  if (!Array.isArray(teamNames)) {
    issues.push("Team names must be a list");
    return issues;
  }

  if (teamNames.length < MIN_TEAMS || teamNames.length > MAX_TEAMS) {
    issues.push(`Team count must be between ${MIN_TEAMS} and ${MAX_TEAMS}`);
  }

  if (teamNames.some((name) => typeof name !== "string" || name.trim().length === 0)) {
    issues.push("Team names must be non-empty strings");
  }

  if (new Set(teamNames).size !== teamNames.length) {
    issues.push("Team names must be unique");
  }

  return issues;
}

export function initializeGame(
  teamNames: readonly TeamName[],
  { roundTimeSeconds, maxPoints }: InitializeGameOptions,
): GameState {
  const issues = validateTeamNames(teamNames);

  if (!isPositiveInteger(roundTimeSeconds)) {
    issues.push("Round time must be a positive whole number of seconds");
  }

  if (maxPoints !== undefined && !isPositiveInteger(maxPoints)) {
    issues.push("Winning score must be a positive whole number");
  }

  if (issues.length > 0) {
    throw InvalidConfigurationError.because(issues);
  }

  return {
    teams: teamNames.map((name) => ({ name, score: 0 })),
    currentTeamIndex: 0,
    currentWord: "",
    guessedWords: [],
    roundTimeSeconds,
    maxPoints,
    roundStartedAt: 0,
    gameStarted: false,
    countdownStarted: false,
    countdownStartedAt: 0,
    gameEnded: false,
    winner: undefined,
  };
}

export function startCountdown(state: GameState, now: TimePoint): GameState {
  ensurePhase(state, "start the countdown", ["idle"]);
  return { ...state, countdownStarted: true, countdownStartedAt: now };
}

export function countdownRemaining(state: GameState, now: TimePoint): number {
  if (!state.countdownStarted) return 0;
  const remaining = COUNTDOWN_SECONDS - elapsedSeconds(state.countdownStartedAt, now);
  return Math.min(COUNTDOWN_SECONDS, Math.max(0, remaining));
}

export function isCountdownFinished(state: GameState, now: TimePoint): boolean {
  return state.countdownStarted && countdownRemaining(state, now) === 0;
}

export function startRound(
  state: GameState,
  now: TimePoint,
  words: WordSource,
): GameState {
  ensurePhase(state, "start a round", ["countdown"]);
  if (!isCountdownFinished(state, now)) {
    throw new IllegalTransitionError("start a round before the countdown ends", "countdown");
  }

  return {
    ...state,
    currentWord: words.next(),
    guessedWords: [],
    roundStartedAt: now,
    gameStarted: true,
    countdownStarted: false,
  };
}

export function remainingTime(state: GameState, now: TimePoint): number {
  if (!state.gameStarted) return state.roundTimeSeconds;
  const remaining = state.roundTimeSeconds - elapsedSeconds(state.roundStartedAt, now);
  return Math.min(state.roundTimeSeconds, Math.max(0, remaining));
}

export function isRoundFinished(state: GameState, now: TimePoint): boolean {
  return state.gameStarted && remainingTime(state, now) === 0;
}

/**
 * Scores the current word for the describing team. Reaching the winning
 * threshold ends the game and keeps the last word on display.
 */
export function markSuccess(state: GameState, words: WordSource): GameState {
  ensurePhase(state, "mark a word as guessed", ["active"]);

  const teams = awardPoint(state.teams, state.currentTeamIndex);
  const guessedWords = [...state.guessedWords, state.currentWord];
  const scorer = teams[state.currentTeamIndex];

  if (scorer && state.maxPoints !== undefined && scorer.score >= state.maxPoints) {
    return {
      ...state,
      teams,
      guessedWords,
      gameStarted: false,
      countdownStarted: false,
      gameEnded: true,
      winner: scorer.name,
    };
  }

  return { ...state, teams, guessedWords, currentWord: words.next() };
}

export function skip(state: GameState, words: WordSource): GameState {
  ensurePhase(state, "skip a word", ["active"]);
  return { ...state, currentWord: words.next() };
}

/**
 * Gives the next team in rotation a point once time is up. The winning threshold
 * is not checked here and the round stays open until ended.
 */
export function markEnemyGuessed(state: GameState, now: TimePoint): GameState {
  ensurePhase(state, "award the enemy team", ["active"]);
  if (!isRoundFinished(state, now)) {
    throw new IllegalTransitionError("award the enemy team before time is up", "active");
  }

  const enemyIndex = (state.currentTeamIndex + 1) % state.teams.length;
  return { ...state, teams: awardPoint(state.teams, enemyIndex) };
}

export function endRound(state: GameState): GameState {
  ensurePhase(state, "end the round", ["active", "countdown"]);
  return {
    ...state,
    currentTeamIndex: (state.currentTeamIndex + 1) % state.teams.length,
    gameStarted: false,
    countdownStarted: false,
  };
}

/** Highest score first; equal scores keep their rotation order. */
export function leaderboard(teams: readonly Team[]): Team[] {
  return [...teams].sort((a, b) => b.score - a.score);
}

export function describeGame(state: GameState, now: TimePoint): GameSnapshot {
  return {
    phase: phaseOf(state),
    teams: state.teams,
    currentTeam: currentTeam(state),
    currentWord: state.currentWord,
    guessedWords: state.guessedWords,
    roundTimeSeconds: state.roundTimeSeconds,
    maxPoints: state.maxPoints,
    remainingSeconds: remainingTime(state, now),
    countdown: countdownRemaining(state, now),
    roundFinished: isRoundFinished(state, now),
    countdownFinished: isCountdownFinished(state, now),
    leaderboard: leaderboard(state.teams),
    winner: state.winner,
  };
}

// -----------------------------------------------------------------------------
//  Assertion function: runtime invariant check
// -----------------------------------------------------------------------------
export function assertValidGameState(state: GameState): void {
  const fail = (reason: string): never => {
    throw new InvalidGameStateError(reason, state);
  };

  if (!Array.isArray(state.teams)) fail("invalid or missing teams");
  if (state.teams.length < MIN_TEAMS || state.teams.length > MAX_TEAMS)
    fail("team count out of range");

  const names = state.teams.map((team) => team.name);
  if (names.some((name) => name.trim().length === 0)) fail("blank team name");
  if (new Set(names).size !== names.length) fail("duplicate team names");

  for (const team of state.teams) {
    if (!Number.isInteger(team.score) || team.score < 0)
      fail(`invalid score for ${team.name}`);
  }

  if (
    !Number.isInteger(state.currentTeamIndex) ||
    state.currentTeamIndex < 0 ||
    state.currentTeamIndex >= state.teams.length
  )
    fail("current team index out of range");

  if (!isPositiveInteger(state.roundTimeSeconds)) fail("invalid round time");
  if (state.maxPoints !== undefined && !isPositiveInteger(state.maxPoints))
    fail("invalid winning score");

  if (state.gameStarted && state.countdownStarted)
    fail("round and countdown active at once");

  if (state.gameEnded) {
    if (state.gameStarted || state.countdownStarted) fail("ended game still running");
    if (state.winner === undefined || !names.includes(state.winner))
      fail("ended game without a known winner");
  } else if (state.winner !== undefined) {
    fail("winner recorded before the game ended");
  }
}
