import { serve } from "@hono/node-server";
import { createNodeWebSocket } from "@hono/node-ws";
import type { WSContext } from "hono/ws";
import type { AddressInfo } from "node:net";
import type { WebSocket } from "ws";

import { RealScheduler } from "./adapters/RealScheduler.js";
import { WebSocketBus } from "./adapters/WebSocketBus.js";
import { createBackendApp } from "./app.js";
import { GAME_CHANNEL, broadcastingDispatch, gameUpdated } from "./broadcast.js";
import { loadBackendConfig } from "./config.js";
import {
  GameEngine,
  createGameConfig,
  createWordSource,
  dispatchCommand,
  mulberry32,
} from "./core.js";
import type { CommandContext } from "./core.js";
import { createConsoleLogger } from "./logger.js";

export async function startServer(): Promise<void> {
  const config = loadBackendConfig();
  const logger = createConsoleLogger("backend-local", config.debug);

  const words = createWordSource({
    path: config.wordsFile,
    rng: config.wordSeed === undefined ? undefined : mulberry32(config.wordSeed),
    logger,
  });
  const engine = new GameEngine({ words, logger });
  const bus = new WebSocketBus(logger);
  const dispatch = broadcastingDispatch(dispatchCommand, bus);

  let scheduler: RealScheduler;

  const createContext = (): CommandContext => ({
    engine,
    scheduler,
    logger,
  });

  scheduler = new RealScheduler({
    contextFactory: async (): Promise<CommandContext> => createContext(),
    dispatch,
    logger,
  });

  const app = createBackendApp({
    port: config.port,
    engine,
    defaultConfig: createGameConfig({
      roundTimeSeconds: config.defaultRoundTimeSeconds,
    }),
    logger,
    createContext,
    dispatch,
  });

  const { upgradeWebSocket, injectWebSocket } = createNodeWebSocket({ app });

  app.get(
    "/ws",
    upgradeWebSocket(() => ({
      onOpen(_event: Event, ws: WSContext<WebSocket>): void {
        const rawSocket = ws.raw;
        if (!rawSocket) {
          logger.warn("WebSocket connection missing raw handle");
          return;
        }
        bus.attach(GAME_CHANNEL, rawSocket);
        rawSocket.send(JSON.stringify(gameUpdated(engine, "Connected", Date.now())));
      },
    })),
  );

  const server = serve({ fetch: app.fetch, port: config.port }, (info: AddressInfo) => {
    logger.info("Server listening", info);
  });

  injectWebSocket(server);

  process.once("SIGINT", () => {
    scheduler.cancelAll();
    server.close();
  });
}

void startServer().catch((error) => {
  createConsoleLogger("backend-local").error("Failed to start backend", { error });
  process.exit(1);
});
