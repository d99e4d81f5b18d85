import { describe, expect, it } from "vitest";

import { createCommandContext } from "./support/mocks.js";
import { CreateGame } from "../src/domain/commands/CreateGame.js";
import { dispatchCommand } from "../src/domain/commands/dispatchCommand.js";
import { EndRound } from "../src/domain/commands/EndRound.js";
import { MarkEnemyGuessed } from "../src/domain/commands/MarkEnemyGuessed.js";
import { MarkSuccess } from "../src/domain/commands/MarkSuccess.js";
import { ResetGame } from "../src/domain/commands/ResetGame.js";
import { SkipWord } from "../src/domain/commands/SkipWord.js";
import { StartCountdown } from "../src/domain/commands/StartCountdown.js";
import { StartRound } from "../src/domain/commands/StartRound.js";
import {
  IllegalTransitionError,
  InvalidConfigurationError,
} from "../src/domain/errors/index.js";
import { createGameConfig } from "../src/domain/GameConfig.js";

const T0 = Date.UTC(2024, 4, 20, 12, 0, 0);

async function playingContext() {
  const context = createCommandContext();
  await new CreateGame(["Owls", "Foxes"], createGameConfig(), T0).execute(context);
  await new StartCountdown(T0).execute(context);
  await new StartRound(T0 + 3_000).execute(context);
  return context;
}

describe("CreateGame", () => {
  it("initializes the engine with the requested teams", async () => {
    const context = createCommandContext();
    const { engine, logger } = context;

    await new CreateGame(
      ["Owls", "Foxes"],
      createGameConfig({ roundTimeSeconds: 90, maxPoints: 20 }),
      T0,
    ).execute(context);

    expect(engine.state.teams.map((team) => team.name)).toEqual(["Owls", "Foxes"]);
    expect(engine.state.roundTimeSeconds).toBe(90);
    expect(engine.state.maxPoints).toBe(20);
    expect(logger.info).toHaveBeenCalledWith("Game created", {
      type: "CreateGame",
      teams: ["Owls", "Foxes"],
      at: T0,
    });
  });

  it.each([
    [createGameConfig({ roundTimeSeconds: 20 })],
    [createGameConfig({ roundTimeSeconds: 181 })],
    [createGameConfig({ roundTimeSeconds: 45.5 })],
    [createGameConfig({ maxPoints: 4 })],
    [createGameConfig({ maxPoints: 101 })],
  ])("rejects settings outside the supported range (%o)", (config) => {
    expect(() => new CreateGame(["Owls", "Foxes"], config, T0)).toThrow(
      InvalidConfigurationError,
    );
  });

  it("names both range problems at once", () => {
    expect(
      () =>
        new CreateGame(
          ["Owls", "Foxes"],
          createGameConfig({ roundTimeSeconds: 10, maxPoints: 1 }),
          T0,
        ),
    ).toThrow(
      "Invalid game configuration: roundTimeSeconds must be a whole number between 30 and 180; maxPoints must be a whole number between 5 and 100",
    );
  });

  it("rejects duplicate team names when executed", async () => {
    const context = createCommandContext();
    const command = new CreateGame(["Owls", "Owls"], createGameConfig(), T0);

    await expect(command.execute(context)).rejects.toThrow(InvalidConfigurationError);
    expect(context.engine.hasGame).toBe(false);
  });
});

describe("StartCountdown", () => {
  it("starts the countdown and schedules its timeout", async () => {
    const context = createCommandContext();
    await new CreateGame(["Owls", "Foxes"], createGameConfig(), T0).execute(context);

    await new StartCountdown(T0 + 500).execute(context);

    expect(context.engine.phase).toBe("countdown");
    expect(context.engine.state.countdownStartedAt).toBe(T0 + 500);
    expect(context.scheduler.scheduleTimeout).toHaveBeenCalledWith("countdown", 3_000);
  });

  it("does not schedule anything when the countdown cannot start", async () => {
    const context = await playingContext();
    context.scheduler.scheduleTimeout.mockClear();

    await expect(new StartCountdown(T0 + 5_000).execute(context)).rejects.toThrow(
      IllegalTransitionError,
    );
    expect(context.scheduler.scheduleTimeout).not.toHaveBeenCalled();
  });
});

describe("round actions", () => {
  it("scores a guessed word", async () => {
    const context = await playingContext();

    await new MarkSuccess(T0 + 4_000).execute(context);

    expect(context.engine.state.teams[0]).toEqual({ name: "Owls", score: 1 });
    expect(context.logger.info).toHaveBeenCalledWith("Word guessed", {
      type: "MarkSuccess",
      word: "alpha",
      team: { name: "Owls", score: 1 },
      at: T0 + 4_000,
    });
  });

  it("logs the end of the game when the winning word is guessed", async () => {
    const context = createCommandContext();
    await new CreateGame(
      ["Owls", "Foxes"],
      createGameConfig({ maxPoints: 5 }),
      T0,
    ).execute(context);
    await new StartCountdown(T0).execute(context);
    await new StartRound(T0 + 3_000).execute(context);

    for (let i = 0; i < 5; i += 1) {
      await new MarkSuccess(T0 + 4_000 + i).execute(context);
    }

    expect(context.engine.phase).toBe("ended");
    expect(context.logger.info).toHaveBeenCalledWith("Game ended", {
      type: "MarkSuccess",
      winner: "Owls",
      at: T0 + 4_004,
    });
  });

  it("skips a word", async () => {
    const context = await playingContext();

    await new SkipWord(T0 + 4_000).execute(context);

    expect(context.engine.state.currentWord).toBe("beta");
    expect(context.engine.state.guessedWords).toEqual([]);
  });

  it("awards the enemy team once time is up", async () => {
    const context = await playingContext();

    await new MarkEnemyGuessed(T0 + 63_000).execute(context);

    expect(context.engine.state.teams[1]).toEqual({ name: "Foxes", score: 1 });
    expect(context.logger.info).toHaveBeenCalledWith("Enemy team awarded the last word", {
      type: "MarkEnemyGuessed",
      team: { name: "Foxes", score: 1 },
      at: T0 + 63_000,
    });
  });

  it("ends a round early and hands over to the next team", async () => {
    const context = await playingContext();

    await new EndRound(T0 + 10_000).execute(context);

    expect(context.engine.phase).toBe("idle");
    expect(context.engine.state.currentTeamIndex).toBe(1);
    expect(context.logger.info).toHaveBeenCalledWith("Round ended", {
      type: "EndRound",
      endedEarly: true,
      nextTeam: "Foxes",
      at: T0 + 10_000,
    });
  });

  it("notes when a round ends after its time ran out", async () => {
    const context = await playingContext();

    await new EndRound(T0 + 70_000).execute(context);

    expect(context.logger.info).toHaveBeenCalledWith(
      "Round ended",
      expect.objectContaining({ endedEarly: false }),
    );
  });

  it("resets the game", async () => {
    const context = await playingContext();

    await new ResetGame(T0 + 5_000).execute(context);

    expect(context.engine.hasGame).toBe(false);
    expect(context.logger.info).toHaveBeenCalledWith("Game reset", {
      type: "ResetGame",
      at: T0 + 5_000,
    });
  });
});

describe("dispatchCommand", () => {
  it("logs the start and completion of a command", async () => {
    const context = await playingContext();

    await dispatchCommand(new SkipWord(T0 + 4_000), context);

    expect(context.logger.info).toHaveBeenCalledWith("[CMD] SkipWord", { at: T0 + 4_000 });
    expect(context.logger.info).toHaveBeenCalledWith("[CMD OK] SkipWord", {
      ms: expect.any(Number),
    });
    expect(context.logger.error).not.toHaveBeenCalled();
  });

  it("logs and rethrows failures", async () => {
    const context = createCommandContext();
    await new CreateGame(["Owls", "Foxes"], createGameConfig(), T0).execute(context);

    await expect(dispatchCommand(new MarkSuccess(T0), context)).rejects.toThrow(
      IllegalTransitionError,
    );
    expect(context.logger.error).toHaveBeenCalledWith("[CMD ERR] MarkSuccess", {
      error: expect.any(IllegalTransitionError),
    });
  });
});
