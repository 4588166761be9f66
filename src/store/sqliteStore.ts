import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { StoreContentionError } from "../core/errors";
import { sleep } from "../core/timeout";
import { createDefaultRecord, deriveDownloaded } from "../state";
import {
  isParseStatus,
  isTrackerEventType,
  isTriState,
  PARSER_NAMES,
  ProcessingRecord,
  TrackerEvent,
  TRACKED_SOURCES,
} from "../types";
import { EventFilter, Lease, MutationFn, MutationResult, QueryOptions, TrackerStore } from "./types";

type TrackerRow = Record<string, string | number | null>;

type EventRow = {
  seq: number;
  timestamp: string;
  id: string;
  event_type: string;
  detail: string;
};

type LeaseRow = {
  id: string;
  owner: string;
  acquired_at: string;
  expires_at: string;
};

export interface SqliteTrackerStoreOptions {
  /** Extra attempts after SQLITE_BUSY/SQLITE_LOCKED before StoreContentionError. */
  busyRetries?: number;
  busyRetryDelayMs?: number;
  /** Passed to SQLite as its own busy handler timeout. */
  busyTimeoutMs?: number;
  clock?: () => Date;
}

const TRACKER_COLUMNS: string[] = [
  "id",
  ...TRACKED_SOURCES.flatMap((source) => [`${source}_attempted`, `${source}_succeeded`]),
  "downloaded",
  "download_timestamp",
  "download_source",
  "content_ingested",
  ...PARSER_NAMES.flatMap((parser) => [`${parser}_status`, `${parser}_timestamp`]),
  "retry_count",
  "last_error",
  "last_updated",
];

function isBusyError(error: unknown): boolean {
  if (!(error instanceof Database.SqliteError)) {
    return false;
  }
  return error.code.startsWith("SQLITE_BUSY") || error.code.startsWith("SQLITE_LOCKED");
}

function toText(value: string | number | null | undefined): string | null {
  return typeof value === "string" ? value : null;
}

export class SqliteTrackerStore implements TrackerStore {
  private readonly db: Database.Database;
  private readonly busyRetries: number;
  private readonly busyRetryDelayMs: number;
  private readonly clock: () => Date;

  constructor(dbPath: string, options: SqliteTrackerStoreOptions = {}) {
    const inMemory = dbPath === ":memory:";
    const location = inMemory ? dbPath : path.resolve(dbPath);
    if (!inMemory) {
      fs.mkdirSync(path.dirname(location), { recursive: true });
    }

    this.db = new Database(location, { timeout: options.busyTimeoutMs ?? 1_000 });
    if (!inMemory) {
      this.db.pragma("journal_mode = WAL");
    }
    this.busyRetries = options.busyRetries ?? 8;
    this.busyRetryDelayMs = options.busyRetryDelayMs ?? 50;
    this.clock = options.clock ?? (() => new Date());
    this.initializeSchema();
  }

  async get(id: string): Promise<ProcessingRecord> {
    return this.readRecord(id) ?? createDefaultRecord(id, this.now());
  }

  async applyMutation(id: string, mutation: MutationFn): Promise<MutationResult> {
    const insertEvent = this.db.prepare(`
      INSERT INTO tracker_events (timestamp, id, event_type, detail)
      VALUES (@timestamp, @id, @eventType, @detail)
    `);

    const tx = this.db.transaction((now: string): MutationResult => {
      const current = this.readRecord(id) ?? createDefaultRecord(id, now);
      const draft = mutation(current, now);
      if (!draft) {
        return { record: current, changed: false, events: [] };
      }

      const record: ProcessingRecord = {
        ...draft.record,
        id,
        downloaded: deriveDownloaded(draft.record.sources),
        lastUpdated: now,
      };
      this.writeRecord(record);

      const events: TrackerEvent[] = [];
      for (const pending of draft.events ?? []) {
        const info = insertEvent.run({
          timestamp: now,
          id,
          eventType: pending.eventType,
          detail: JSON.stringify(pending.detail),
        });
        events.push({ seq: Number(info.lastInsertRowid), timestamp: now, id, ...pending });
      }

      return { record, changed: true, events };
    });

    return this.withBusyRetry("applyMutation", () => tx.immediate(this.now()));
  }

  async query(predicate: (record: ProcessingRecord) => boolean, options: QueryOptions = {}): Promise<ProcessingRecord[]> {
    const readAll = this.db.transaction(
      () =>
        this.db
          .prepare(`SELECT * FROM processing_tracker ORDER BY last_updated ASC, id ASC`)
          .all() as TrackerRow[],
    );

    const matches: ProcessingRecord[] = [];
    for (const row of readAll.deferred()) {
      const record = this.rowToRecord(row);
      if (!predicate(record)) {
        continue;
      }
      matches.push(record);
      if (options.limit !== undefined && matches.length >= options.limit) {
        break;
      }
    }
    return matches;
  }

  async listEvents(filter: EventFilter = {}): Promise<TrackerEvent[]> {
    const rows = this.db
      .prepare(
        `
        SELECT seq, timestamp, id, event_type, detail
        FROM tracker_events
        WHERE (@id IS NULL OR id = @id)
          AND (@eventType IS NULL OR event_type = @eventType)
        ORDER BY seq ASC
        LIMIT @limit
      `,
      )
      .all({
        id: filter.id ?? null,
        eventType: filter.eventType ?? null,
        limit: filter.limit ?? -1,
      }) as EventRow[];

    return rows.flatMap((row) => {
      const eventType = row.event_type;
      if (!isTrackerEventType(eventType)) {
        return [];
      }
      const detail: unknown = JSON.parse(row.detail);
      const event: TrackerEvent = {
        seq: row.seq,
        timestamp: row.timestamp,
        id: row.id,
        eventType,
        detail: detail && typeof detail === "object" && !Array.isArray(detail) ? { ...detail } : { value: detail },
      };
      return [event];
    });
  }

  async ensureRecords(ids: readonly string[]): Promise<number> {
    const insert = this.db.prepare(`
      INSERT INTO processing_tracker (id, last_updated)
      VALUES (@id, @now)
      ON CONFLICT(id) DO NOTHING
    `);
    const tx = this.db.transaction((batch: readonly string[], now: string) => {
      let created = 0;
      for (const id of batch) {
        created += insert.run({ id, now }).changes;
      }
      return created;
    });

    return this.withBusyRetry("ensureRecords", () => tx.immediate(ids, this.now()));
  }

  async acquireLease(id: string, owner: string, ttlMs: number): Promise<boolean> {
    const tx = this.db.transaction((nowDate: Date): boolean => {
      const now = nowDate.toISOString();
      const existing = this.db
        .prepare(`SELECT id, owner, acquired_at, expires_at FROM tracker_leases WHERE id = ?`)
        .get(id) as LeaseRow | undefined;
      if (existing && existing.owner !== owner && existing.expires_at > now) {
        return false;
      }

      this.db
        .prepare(
          `
          INSERT INTO tracker_leases (id, owner, acquired_at, expires_at)
          VALUES (@id, @owner, @acquiredAt, @expiresAt)
          ON CONFLICT(id) DO UPDATE SET
            owner = excluded.owner,
            acquired_at = excluded.acquired_at,
            expires_at = excluded.expires_at
        `,
        )
        .run({
          id,
          owner,
          acquiredAt: now,
          expiresAt: new Date(nowDate.getTime() + ttlMs).toISOString(),
        });
      return true;
    });

    return this.withBusyRetry("acquireLease", () => tx.immediate(this.clock()));
  }

  async releaseLease(id: string, owner: string): Promise<void> {
    await this.withBusyRetry("releaseLease", () => {
      this.db.prepare(`DELETE FROM tracker_leases WHERE id = ? AND owner = ?`).run(id, owner);
    });
  }

  async listActiveLeases(): Promise<Lease[]> {
    const rows = this.db
      .prepare(
        `
        SELECT id, owner, acquired_at, expires_at
        FROM tracker_leases
        WHERE expires_at > ?
        ORDER BY id ASC
      `,
      )
      .all(this.now()) as LeaseRow[];

    return rows.map((row) => ({
      id: row.id,
      owner: row.owner,
      acquiredAt: row.acquired_at,
      expiresAt: row.expires_at,
    }));
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private async withBusyRetry<T>(operation: string, work: () => T): Promise<T> {
    for (let attempt = 0; ; attempt += 1) {
      try {
        return work();
      } catch (error) {
        if (!isBusyError(error)) {
          throw error;
        }
        if (attempt >= this.busyRetries) {
          throw new StoreContentionError(operation, attempt + 1, error);
        }
        await sleep(this.busyRetryDelayMs * (attempt + 1));
      }
    }
  }

  private readRecord(id: string): ProcessingRecord | undefined {
    const row = this.db.prepare(`SELECT * FROM processing_tracker WHERE id = ?`).get(id) as TrackerRow | undefined;
    return row ? this.rowToRecord(row) : undefined;
  }

  private writeRecord(record: ProcessingRecord): void {
    const row: TrackerRow = {
      id: record.id,
      downloaded: record.downloaded,
      download_timestamp: record.downloadTimestamp,
      download_source: record.downloadSource,
      content_ingested: record.contentIngested,
      retry_count: record.retryCount,
      last_error: record.lastError,
      last_updated: record.lastUpdated,
    };
    for (const source of TRACKED_SOURCES) {
      row[`${source}_attempted`] = record.sources[source].attempted;
      row[`${source}_succeeded`] = record.sources[source].succeeded;
    }
    for (const parser of PARSER_NAMES) {
      row[`${parser}_status`] = record.parseStages[parser].status;
      row[`${parser}_timestamp`] = record.parseStages[parser].timestamp;
    }

    const updates = TRACKER_COLUMNS.filter((column) => column !== "id").map((column) => `${column} = excluded.${column}`);
    this.db
      .prepare(
        `
        INSERT INTO processing_tracker (${TRACKER_COLUMNS.join(", ")})
        VALUES (${TRACKER_COLUMNS.map((column) => `@${column}`).join(", ")})
        ON CONFLICT(id) DO UPDATE SET ${updates.join(", ")}
      `,
      )
      .run(row);
  }

  private rowToRecord(row: TrackerRow): ProcessingRecord {
    const id = toText(row.id) ?? "";
    const lastUpdated = toText(row.last_updated) ?? this.now();
    const record = createDefaultRecord(id, lastUpdated);

    for (const source of TRACKED_SOURCES) {
      const attempted = row[`${source}_attempted`];
      const succeeded = row[`${source}_succeeded`];
      record.sources[source] = {
        attempted: isTriState(attempted) ? attempted : "unknown",
        succeeded: isTriState(succeeded) ? succeeded : "unknown",
      };
    }
    for (const parser of PARSER_NAMES) {
      const status = row[`${parser}_status`];
      record.parseStages[parser] = {
        status: isParseStatus(status) ? status : "not_attempted",
        timestamp: toText(row[`${parser}_timestamp`]),
      };
    }

    record.downloaded = deriveDownloaded(record.sources);
    record.downloadSource = toText(row.download_source);
    record.downloadTimestamp = toText(row.download_timestamp);
    const contentIngested = row.content_ingested;
    record.contentIngested = isTriState(contentIngested) ? contentIngested : "unknown";
    record.retryCount = typeof row.retry_count === "number" ? row.retry_count : 0;
    record.lastError = toText(row.last_error);
    return record;
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS processing_tracker (
        id TEXT PRIMARY KEY,
        downloaded TEXT NOT NULL DEFAULT 'unknown',
        download_timestamp TEXT NULL,
        download_source TEXT NULL,
        content_ingested TEXT NOT NULL DEFAULT 'unknown',
        retry_count INTEGER NOT NULL DEFAULT 0,
        last_error TEXT NULL,
        last_updated TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tracker_events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        id TEXT NOT NULL,
        event_type TEXT NOT NULL,
        detail TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS tracker_leases (
        id TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        acquired_at TEXT NOT NULL,
        expires_at TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_tracker_last_updated ON processing_tracker(last_updated);
      CREATE INDEX IF NOT EXISTS idx_tracker_events_id ON tracker_events(id);
      CREATE INDEX IF NOT EXISTS idx_tracker_events_type ON tracker_events(event_type);
    `);

    for (const source of TRACKED_SOURCES) {
      this.ensureColumn("processing_tracker", `${source}_attempted`, "TEXT NOT NULL DEFAULT 'unknown'");
      this.ensureColumn("processing_tracker", `${source}_succeeded`, "TEXT NOT NULL DEFAULT 'unknown'");
    }
    for (const parser of PARSER_NAMES) {
      this.ensureColumn("processing_tracker", `${parser}_status`, "TEXT NOT NULL DEFAULT 'not_attempted'");
      this.ensureColumn("processing_tracker", `${parser}_timestamp`, "TEXT NULL");
    }
  }

  private ensureColumn(tableName: string, columnName: string, definition: string): void {
    const columns = this.db.prepare(`PRAGMA table_info(${tableName})`).all() as Array<{ name: string }>;
    if (columns.some((column) => column.name === columnName)) {
      return;
    }

    this.db.exec(`ALTER TABLE ${tableName} ADD COLUMN ${columnName} ${definition}`);
  }
}
