import { SendMessageBatchCommand, SQSClient } from "@aws-sdk/client-sqs";
import { sleep } from "../core/timeout";
import { TrackerEvent } from "../types";
import { BaseSink } from "./baseSink";
import { EventEnvelope, idempotencyKey } from "./types";

interface SqsClientLike {
  send(command: SendMessageBatchCommand): Promise<{ Failed?: Array<{ Id?: string; SenderFault?: boolean }> }>;
}

export interface SqsSinkOptions {
  queueUrl?: string;
  runId: string;
  client?: SqsClientLike;
  fifo?: boolean;
  maxRetries?: number;
  retryDelayMs?: number;
}

interface BatchEntry {
  Id: string;
  MessageBody: string;
  MessageDeduplicationId?: string;
  MessageGroupId?: string;
}

const BATCH_LIMIT = 10;

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

export class SqsSink extends BaseSink {
  private readonly queueUrl?: string;
  private readonly runId: string;
  private readonly client: SqsClientLike;
  private readonly fifo: boolean;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;

  constructor(options: SqsSinkOptions) {
    super();
    this.queueUrl = options.queueUrl;
    this.runId = options.runId;
    this.client = options.client ?? new SQSClient({});
    this.fifo = options.fifo ?? Boolean(this.queueUrl?.endsWith(".fifo"));
    this.maxRetries = options.maxRetries ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  async publishEvents(events: TrackerEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    const queueUrl = this.ensureConfigured("SQS", this.queueUrl);
    const entries = events.map((event, index) => {
      const envelope: EventEnvelope = {
        runId: this.runId,
        sentAt: new Date().toISOString(),
        event,
      };
      const entry: BatchEntry = {
        Id: String(index),
        MessageBody: JSON.stringify(envelope),
      };

      // Per-identifier ordering on FIFO queues.
      if (this.fifo) {
        entry.MessageGroupId = event.id;
        entry.MessageDeduplicationId = idempotencyKey(event);
      }

      return entry;
    });

    for (const entryBatch of chunk(entries, BATCH_LIMIT)) {
      await this.sendBatchWithRetries(queueUrl, entryBatch);
    }
  }

  private async sendBatchWithRetries(queueUrl: string, originalEntries: BatchEntry[]): Promise<void> {
    let pendingEntries = [...originalEntries];
    let attempt = 0;

    while (pendingEntries.length > 0) {
      attempt += 1;
      const command = new SendMessageBatchCommand({
        QueueUrl: queueUrl,
        Entries: pendingEntries,
      });
      const response = await this.client.send(command);

      const failedIds = new Set((response.Failed ?? []).map((f) => f.Id).filter((id): id is string => Boolean(id)));
      if (failedIds.size === 0) {
        return;
      }

      if (attempt > this.maxRetries) {
        throw new Error(`SQS publish failed after retries (${failedIds.size} entries still failed)`);
      }

      pendingEntries = pendingEntries.filter((entry) => failedIds.has(entry.Id));
      await sleep(this.retryDelayMs * attempt);
    }
  }
}
