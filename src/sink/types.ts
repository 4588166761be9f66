import { TrackerEvent } from "../types";

export interface Sink {
  publishEvents(events: TrackerEvent[]): Promise<void>;
}

/** Envelope shared by the remote sinks. */
export interface EventEnvelope {
  runId: string;
  sentAt: string;
  event: TrackerEvent;
}

export function idempotencyKey(event: TrackerEvent): string {
  return `${event.id}:${event.seq}`;
}
