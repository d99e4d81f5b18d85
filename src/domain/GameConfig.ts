export interface GameConfig {
  readonly roundTimeSeconds: number;
  readonly maxPoints: number | undefined;
}

export type GameConfigOverrides = Partial<GameConfig>;

export const COUNTDOWN_SECONDS = 3;

export const MIN_TEAMS = 2;
export const MAX_TEAMS = 6;

/** Round durations the setup screen offers */
export const ROUND_TIME_RANGE = { min: 30, max: 180 } as const;

/** Winning thresholds the setup screen offers */
export const MAX_POINTS_RANGE = { min: 5, max: 100 } as const;

export function createGameConfig(overrides: GameConfigOverrides = {}): GameConfig {
  return {
    roundTimeSeconds: overrides.roundTimeSeconds ?? 60,
    maxPoints: overrides.maxPoints,
  };
}
