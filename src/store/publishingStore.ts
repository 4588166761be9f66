import { Logger } from "../observability";
import { Sink } from "../sink";
import { ProcessingRecord, TrackerEvent } from "../types";
import { EventFilter, Lease, MutationFn, MutationResult, QueryOptions, TrackerStore } from "./types";

/**
 * Forwards every event appended by a committed mutation to a sink. A sink
 * failure is logged and never undoes the commit.
 */
export class PublishingTrackerStore implements TrackerStore {
  private readonly inner: TrackerStore;
  private readonly sink: Sink;
  private readonly logger: Logger;

  constructor(inner: TrackerStore, sink: Sink, logger: Logger) {
    this.inner = inner;
    this.sink = sink;
    this.logger = logger;
  }

  get(id: string): Promise<ProcessingRecord> {
    return this.inner.get(id);
  }

  async applyMutation(id: string, mutation: MutationFn): Promise<MutationResult> {
    const result = await this.inner.applyMutation(id, mutation);
    if (result.events.length > 0) {
      await this.publish(result.events);
    }
    return result;
  }

  query(predicate: (record: ProcessingRecord) => boolean, options?: QueryOptions): Promise<ProcessingRecord[]> {
    return this.inner.query(predicate, options);
  }

  listEvents(filter?: EventFilter): Promise<TrackerEvent[]> {
    return this.inner.listEvents(filter);
  }

  ensureRecords(ids: readonly string[]): Promise<number> {
    return this.inner.ensureRecords(ids);
  }

  acquireLease(id: string, owner: string, ttlMs: number): Promise<boolean> {
    return this.inner.acquireLease(id, owner, ttlMs);
  }

  releaseLease(id: string, owner: string): Promise<void> {
    return this.inner.releaseLease(id, owner);
  }

  listActiveLeases(): Promise<Lease[]> {
    return this.inner.listActiveLeases();
  }

  close(): Promise<void> {
    return this.inner.close();
  }

  private async publish(events: TrackerEvent[]): Promise<void> {
    try {
      await this.sink.publishEvents(events);
    } catch (error) {
      this.logger.warn("event_publish_failed", {
        doi: events[0]?.id,
        events: events.length,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
