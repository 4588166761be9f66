import type { Options } from "amqplib";
import { connect as amqpConnect } from "amqplib";
import { sleep } from "../core/timeout";
import { Logger } from "../observability";
import { TrackerEvent } from "../types";
import { BaseSink } from "./baseSink";
import { EventEnvelope, idempotencyKey } from "./types";

type ConnectFn = (url: string) => Promise<ConnectionLike>;

interface ConnectionLike {
  createConfirmChannel(): Promise<ChannelLike>;
  close(): Promise<void>;
}

interface ChannelLike {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms?(): Promise<void>;
  close(): Promise<void>;
}

export interface RabbitSinkOptions {
  connectionUrl?: string;
  runId: string;
  exchange?: string;
  routingKeyPrefix?: string;
  exchangeType?: string;
  maxRetries?: number;
  retryDelayMs?: number;
  connectFn?: ConnectFn;
  logger?: Logger;
}

export class RabbitSink extends BaseSink {
  private readonly connectionUrl?: string;
  private readonly runId: string;
  private readonly exchange: string;
  private readonly routingKeyPrefix: string;
  private readonly exchangeType: string;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly connectFn: ConnectFn;

  constructor(options: RabbitSinkOptions) {
    super(options.logger);
    this.connectionUrl = options.connectionUrl;
    this.runId = options.runId;
    this.exchange = options.exchange ?? "doi-acquire.tracker";
    this.routingKeyPrefix = options.routingKeyPrefix ?? "tracker";
    this.exchangeType = options.exchangeType ?? "topic";
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.connectFn = options.connectFn ?? ((url: string) => amqpConnect(url));
  }

  async publishEvents(events: TrackerEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    const url = this.ensureConfigured("RabbitMQ", this.connectionUrl);

    let attempt = 0;
    while (true) {
      attempt += 1;
      let connection: ConnectionLike | undefined;
      let channel: ChannelLike | undefined;

      try {
        connection = await this.connectFn(url);
        channel = await connection.createConfirmChannel();
        await channel.assertExchange(this.exchange, this.exchangeType, { durable: true });

        for (const event of events) {
          const envelope: EventEnvelope = {
            runId: this.runId,
            sentAt: new Date().toISOString(),
            event,
          };

          channel.publish(this.exchange, `${this.routingKeyPrefix}.${event.eventType}`, Buffer.from(JSON.stringify(envelope)), {
            persistent: true,
            contentType: "application/json",
            headers: {
              "x-event-type": event.eventType,
              "x-doi": event.id,
              "x-idempotency-key": idempotencyKey(event),
            },
          });
        }

        if (typeof channel.waitForConfirms === "function") {
          await channel.waitForConfirms();
        }

        await channel.close();
        await connection.close();
        return;
      } catch (error) {
        if (channel) {
          await channel.close().catch((closeError: unknown) => this.warnCleanup("rabbit", closeError));
        }
        if (connection) {
          await connection.close().catch((closeError: unknown) => this.warnCleanup("rabbit", closeError));
        }

        if (attempt > this.maxRetries) {
          throw error;
        }
      }

      await sleep(this.retryDelayMs * attempt);
    }
  }
}
