import { PendingEvent, ProcessingRecord, TrackerEvent, TrackerEventType } from "../types";

export interface MutationDraft {
  record: ProcessingRecord;
  events?: PendingEvent[];
}

/**
 * Pure transition run inside the store transaction. It may be re-run when the
 * transaction is retried, so it must not perform I/O. Returning null means
 * "no change": nothing is written and no event is appended.
 */
export type MutationFn = (current: ProcessingRecord, now: string) => MutationDraft | null;

export interface MutationResult {
  record: ProcessingRecord;
  changed: boolean;
  events: TrackerEvent[];
}

export interface QueryOptions {
  limit?: number;
}

export interface EventFilter {
  id?: string;
  eventType?: TrackerEventType;
  limit?: number;
}

export interface Lease {
  id: string;
  owner: string;
  acquiredAt: string;
  expiresAt: string;
}

export interface TrackerStore {
  get(id: string): Promise<ProcessingRecord>;
  applyMutation(id: string, mutation: MutationFn): Promise<MutationResult>;
  query(predicate: (record: ProcessingRecord) => boolean, options?: QueryOptions): Promise<ProcessingRecord[]>;
  listEvents(filter?: EventFilter): Promise<TrackerEvent[]>;
  ensureRecords(ids: readonly string[]): Promise<number>;
  acquireLease(id: string, owner: string, ttlMs: number): Promise<boolean>;
  releaseLease(id: string, owner: string): Promise<void>;
  listActiveLeases(): Promise<Lease[]>;
  close(): Promise<void>;
}
