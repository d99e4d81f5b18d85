/* eslint-disable functional/immutable-data */
/* eslint-disable functional/prefer-readonly-type */
import type { Logger } from "../core.js";

export interface EventBus {
  publish(channel: string, event: object): Promise<void>;
}

/** The part of a `ws` socket the bus talks to. */
export interface BusSocket {
  send(data: string): void;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export class WebSocketBus implements EventBus {
  #clients: Map<string, Set<BusSocket>> = new Map();
  readonly #logger: Logger | undefined;

  constructor(logger?: Logger) {
    this.#logger = logger;
  }

  connections(channel: string): number {
    return this.#clients.get(channel)?.size ?? 0;
  }

  async publish(channel: string, event: object): Promise<void> {
    const connections = this.#clients.get(channel);

    if (connections) {
      const message = JSON.stringify(event);
      for (const socket of connections) {
        try {
          socket.send(message);
        } catch (error) {
          this.#logger?.warn("Failed to deliver event", { channel, error });
        }
      }
    }

    this.#logger?.debug("Event published", { channel, receivers: connections?.size ?? 0 });
  }

  attach(channel: string, socket: BusSocket): void {
    let connections = this.#clients.get(channel);
    if (!connections) {
      connections = new Set<BusSocket>();
      this.#clients.set(channel, connections);
    }
    connections.add(socket);

    this.#logger?.info("WebSocket client attached", {
      channel,
      size: connections.size,
    });

    socket.on("close", () => {
      const currentConnections = this.#clients.get(channel);
      if (!currentConnections) {
        return;
      }
      currentConnections.delete(socket);
      if (currentConnections.size === 0) {
        this.#clients.delete(channel);
      }
      this.#logger?.info("WebSocket client disconnected", {
        channel,
        size: currentConnections.size,
      });
    });

    socket.on("error", (error: Error) => {
      this.#logger?.warn("WebSocket client error", { channel, error });
    });
  }
}
