import { describe, expect, it } from "vitest";

import {
  WebSocketBus,
  type BusSocket,
} from "../../packages/backend-local/src/adapters/WebSocketBus.js";
import { createLoggerMock } from "./support/testContext.js";

class FakeSocket implements BusSocket {
  readonly sent: string[] = [];
  failing = false;
  readonly #handlers = new Map<string, Array<(error: Error) => void>>();

  send(data: string): void {
    if (this.failing) {
      throw new Error("socket closed");
    }
    this.sent.push(data);
  }

  on(event: "close", listener: () => void): this;
  on(event: "error", listener: (error: Error) => void): this;
  on(event: string, listener: (error: Error) => void): this {
    const list = this.#handlers.get(event) ?? [];
    list.push(listener);
    this.#handlers.set(event, list);
    return this;
  }

  emit(event: "close" | "error", error = new Error("socket error")): void {
    for (const handler of this.#handlers.get(event) ?? []) {
      handler(error);
    }
  }
}

describe("WebSocketBus", () => {
  it("delivers published events to attached sockets", async () => {
    const bus = new WebSocketBus();
    const clientA = new FakeSocket();
    const clientB = new FakeSocket();

    bus.attach("game", clientA);
    bus.attach("game", clientB);

    await bus.publish("game", { type: "GameUpdated", cause: "SkipWord" });

    const message = JSON.stringify({ type: "GameUpdated", cause: "SkipWord" });
    expect(clientA.sent).toEqual([message]);
    expect(clientB.sent).toEqual([message]);
    expect(bus.connections("game")).toBe(2);
  });

  it("keeps channels apart", async () => {
    const bus = new WebSocketBus();
    const client = new FakeSocket();

    bus.attach("lobby", client);
    await bus.publish("game", { type: "GameUpdated" });

    expect(client.sent).toEqual([]);
  });

  it("removes closed sockets", async () => {
    const bus = new WebSocketBus();
    const client = new FakeSocket();

    bus.attach("game", client);
    client.emit("close");

    await bus.publish("game", { type: "AfterClose" });

    expect(client.sent).toEqual([]);
    expect(bus.connections("game")).toBe(0);
  });

  it("keeps delivering when one socket fails", async () => {
    const logger = createLoggerMock();
    const bus = new WebSocketBus(logger);
    const broken = new FakeSocket();
    const healthy = new FakeSocket();
    broken.failing = true;

    bus.attach("game", broken);
    bus.attach("game", healthy);
    await bus.publish("game", { type: "GameUpdated" });

    expect(healthy.sent).toEqual([JSON.stringify({ type: "GameUpdated" })]);
    expect(logger.warn).toHaveBeenCalledWith("Failed to deliver event", {
      channel: "game",
      error: new Error("socket closed"),
    });
  });

  it("logs socket errors", () => {
    const logger = createLoggerMock();
    const bus = new WebSocketBus(logger);
    const client = new FakeSocket();
    const failure = new Error("connection reset");

    bus.attach("game", client);
    client.emit("error", failure);

    expect(logger.warn).toHaveBeenCalledWith("WebSocket client error", {
      channel: "game",
      error: failure,
    });
  });
});
