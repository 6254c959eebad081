import asyncMqtt, { type AsyncMqttClient } from "async-mqtt";
import type { Logger } from "./logger.js";
import { sleep } from "./utils.js";

/** How long `disconnect()` waits for queued publishes before forcing the close. */
export const DISCONNECT_DRAIN_MS = 5000;

export interface PublishOptions {
  retain?: boolean;
}

/**
 * What the daemon needs from the broker connection. `onConnected` listeners
 * run after the first connect and after every reconnect.
 */
export interface Transport {
  connect(): void;
  publish(topic: string, message: unknown, options?: PublishOptions): Promise<void>;
  onConnected(listener: () => void): void;
  disconnect(): Promise<void>;
}

export interface MqttPublisherOptions {
  url: string;
  clientId?: string;
  username?: string;
  password?: string;
  logger: Logger;
  drainTimeoutMs?: number;
}

export class MqttPublisher implements Transport {
  private client: AsyncMqttClient | undefined;

  private readonly listeners: Array<() => void> = [];

  /** Tail of the publish chain; publishes go out one at a time. */
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly options: MqttPublisherOptions) {}

  onConnected(listener: () => void): void {
    this.listeners.push(listener);
  }

  /**
   * Start connecting. The client reconnects on its own; each successful
   * (re)connect notifies the `onConnected` listeners.
   */
  connect(): void {
    if (this.client) {
      return;
    }
    const { logger } = this.options;
    const client = asyncMqtt.connect(this.options.url, {
      clientId: this.options.clientId,
      username: this.options.username,
      password: this.options.password,
      keepalive: 60,
      reconnectPeriod: 5000,
      // Offline QoS 0 publishes fail instead of waiting for a reconnect.
      queueQoSZero: false,
    });
    client.on("connect", () => {
      logger.log(`Connected to ${this.options.url}`);
      for (const listener of this.listeners) {
        listener();
      }
    });
    client.on("reconnect", () => {
      logger.log("Reconnecting to MQTT broker...");
    });
    client.on("offline", () => {
      logger.warn("MQTT broker is offline");
    });
    client.on("error", (err: Error) => {
      logger.error("MQTT connection error:", err.message);
    });
    this.client = client;
  }

  private getClient(): AsyncMqttClient {
    if (!this.client) {
      throw new Error("MQTT client is not connected; call connect() first");
    }
    return this.client;
  }

  async publish(topic: string, message: unknown, options?: PublishOptions): Promise<void> {
    const payload = typeof message === "string" ? message : JSON.stringify(message);
    const retain = options?.retain ?? false;
    const task = this.queue.then(async () => {
      await this.getClient().publish(topic, payload, { retain, qos: 0 });
    });
    this.queue = task.catch(() => undefined);
    return task;
  }

  /**
   * Wait for queued publishes, then close the connection. Publishes still
   * pending after the drain timeout are dropped and the client is closed
   * forcibly.
   */
  async disconnect(): Promise<void> {
    const drainTimeoutMs = this.options.drainTimeoutMs ?? DISCONNECT_DRAIN_MS;
    const timeout = new AbortController();
    const drained = await Promise.race([
      this.queue.then(() => true),
      sleep(drainTimeoutMs, timeout.signal).then(() => false),
    ]);
    timeout.abort();

    const client = this.client;
    this.client = undefined;
    if (!client) {
      return;
    }
    if (!drained) {
      this.options.logger.warn(`Publishes still pending after ${drainTimeoutMs}ms, closing the connection anyway`);
    }
    await client.end(!drained);
  }
}
