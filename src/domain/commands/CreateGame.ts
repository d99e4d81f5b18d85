import { Command, type CommandContext } from "./Command.js";
import { InvalidConfigurationError } from "../errors/index.js";
import { MAX_POINTS_RANGE, ROUND_TIME_RANGE, type GameConfig } from "../GameConfig.js";
import type { TeamName, TimePoint } from "../typedefs.js";

export class CreateGame extends Command {
  readonly type = "CreateGame" as const;

  constructor(
    public readonly teamNames: readonly TeamName[],
    public readonly config: GameConfig,
    public readonly at: TimePoint,
  ) {
    super();

    const issues = CreateGame.validateConfig(config);
    if (issues.length > 0) {
      throw InvalidConfigurationError.because(issues);
    }
  }

  async execute({ engine, logger }: CommandContext): Promise<void> {
    const state = engine.initialize(this.teamNames, this.config);

    logger?.info("Game created", {
      type: this.type,
      teams: state.teams.map((team) => team.name),
      at: this.at,
    });
  }

  private static validateConfig(config: GameConfig): readonly string[] {
    const issues: string[] = [];

    if (!CreateGame.isWithin(config.roundTimeSeconds, ROUND_TIME_RANGE)) {
      issues.push(
        `roundTimeSeconds must be a whole number between ${ROUND_TIME_RANGE.min} and ${ROUND_TIME_RANGE.max}`,
      );
    }

    if (
      config.maxPoints !== undefined &&
      !CreateGame.isWithin(config.maxPoints, MAX_POINTS_RANGE)
    ) {
      issues.push(
        `maxPoints must be a whole number between ${MAX_POINTS_RANGE.min} and ${MAX_POINTS_RANGE.max}`,
      );
    }

    return issues;
  }

  private static isWithin(
    value: number,
    range: { readonly min: number; readonly max: number },
  ): boolean {
    return Number.isInteger(value) && value >= range.min && value <= range.max;
  }
}
