import { Hono } from "hono";
import type { Context, Next } from "hono";

import {
  CreateGame,
  EndRound,
  IllegalTransitionError,
  InvalidConfigurationError,
  MarkEnemyGuessed,
  MarkSuccess,
  NoActiveGameError,
  ResetGame,
  SkipWord,
  StartCountdown,
  StartRound,
  type GameConfig,
  type GameEngine,
  type TimePoint,
} from "./core.js";
import type { Command, CommandContext, Logger } from "./core.js";
import type { DispatchCommand } from "./broadcast.js";

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly engine: GameEngine;
  readonly defaultConfig: GameConfig;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
}

interface CreateGameBody {
  readonly teams: readonly string[];
  readonly roundTimeSeconds?: number;
  readonly maxPoints?: number | null;
}

type ErrorStatus = 400 | 404 | 409 | 500;

export function createBackendApp({
  port,
  engine,
  defaultConfig,
  logger,
  createContext,
  dispatch,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  const run = async (
    c: Context,
    build: (at: TimePoint) => Command,
  ): Promise<Response> => {
    const now = Date.now();
    try {
      const command = build(now);
      await dispatch(command, createContext());
      return c.json(engine.snapshot(now));
    } catch (error) {
      const status = errorStatus(error);
      if (status === 500) {
        logger.error("Game action failed", { path: c.req.path, error });
      } else {
        logger.warn("Game action rejected", { path: c.req.path, error });
      }
      return c.json({ error: getErrorMessage(error) }, status);
    }
  };

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,DELETE,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: Date.now(), config: { port } }),
  );

  app.post("/api/game", async (c: Context) => {
    const body = await c.req.json<unknown>().catch(() => null);
    const parsed = parseCreateGameBody(body);

    if (typeof parsed === "string") {
      return c.json({ error: parsed }, 400);
    }

    const config: GameConfig = {
      roundTimeSeconds: parsed.roundTimeSeconds ?? defaultConfig.roundTimeSeconds,
      maxPoints: parsed.maxPoints ?? defaultConfig.maxPoints,
    };

    return run(c, (at) => new CreateGame(parsed.teams, config, at));
  });

  app.get("/api/game", (c: Context) => {
    try {
      return c.json(engine.snapshot(Date.now()));
    } catch (error) {
      const status = errorStatus(error);
      return c.json({ error: getErrorMessage(error) }, status);
    }
  });

  app.delete("/api/game", async (c: Context) => {
    try {
      await dispatch(new ResetGame(Date.now()), createContext());
      return c.json({ ok: true });
    } catch (error) {
      logger.error("Failed to reset game", { error });
      return c.json({ error: getErrorMessage(error) }, errorStatus(error));
    }
  });

  app.post("/api/game/countdown", (c: Context) =>
    run(c, (at) => new StartCountdown(at)),
  );

  app.post("/api/game/round", (c: Context) => run(c, (at) => new StartRound(at)));

  app.post("/api/game/success", (c: Context) => run(c, (at) => new MarkSuccess(at)));

  app.post("/api/game/skip", (c: Context) => run(c, (at) => new SkipWord(at)));

  app.post("/api/game/enemy-guessed", (c: Context) =>
    run(c, (at) => new MarkEnemyGuessed(at)),
  );

  app.post("/api/game/end-round", (c: Context) => run(c, (at) => new EndRound(at)));

  return app;
}

function parseCreateGameBody(body: unknown): CreateGameBody | string {
  if (typeof body !== "object" || body === null) {
    return "request body must be a JSON object";
  }

  const teams: unknown = Reflect.get(body, "teams");
  if (
    !Array.isArray(teams) ||
    !teams.every((name): name is string => typeof name === "string")
  ) {
    return "teams must be an array of names";
  }

  const roundTimeSeconds: unknown = Reflect.get(body, "roundTimeSeconds");
  if (roundTimeSeconds !== undefined && typeof roundTimeSeconds !== "number") {
    return "roundTimeSeconds must be a number";
  }

  const maxPoints: unknown = Reflect.get(body, "maxPoints");
  if (maxPoints !== undefined && maxPoints !== null && typeof maxPoints !== "number") {
    return "maxPoints must be a number";
  }

  return {
    teams,
    ...(typeof roundTimeSeconds === "number" ? { roundTimeSeconds } : {}),
    ...(typeof maxPoints === "number" ? { maxPoints } : {}),
  };
}

function errorStatus(error: unknown): ErrorStatus {
  if (error instanceof InvalidConfigurationError) return 400;
  if (error instanceof NoActiveGameError) return 404;
  if (error instanceof IllegalTransitionError) return 409;
  return 500;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
