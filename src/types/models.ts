export const TRI_STATES = ["unknown", "yes", "no"] as const;
export type TriState = (typeof TRI_STATES)[number];

export const PARSE_STATUSES = ["not_attempted", "success", "failed"] as const;
export type ParseStatus = (typeof PARSE_STATUSES)[number];

export const SOURCE_NAMES = ["scihub", "unpaywall", "arxiv", "biorxiv", "europepmc", "semanticscholar"] as const;
export type SourceName = (typeof SOURCE_NAMES)[number];

/** Pseudo-source set by reconciliation when a file is found that no fetch recorded. */
export const RECONCILED_SOURCE = "reconciled";
export type TrackedSource = SourceName | typeof RECONCILED_SOURCE;
export const TRACKED_SOURCES: readonly TrackedSource[] = [...SOURCE_NAMES, RECONCILED_SOURCE];

export const PARSER_NAMES = ["fast", "grobid"] as const;
export type ParserName = (typeof PARSER_NAMES)[number];

export const TRACKER_EVENT_TYPES = [
  "source-attempt",
  "source-success",
  "source-failure",
  "parse-attempt",
  "parse-success",
  "parse-failure",
  "reconciliation-fix",
  "exhausted",
  "content-ingested",
  "reset",
] as const;
export type TrackerEventType = (typeof TRACKER_EVENT_TYPES)[number];

export interface SourceState {
  attempted: TriState;
  succeeded: TriState;
}

export interface ParseStageState {
  status: ParseStatus;
  timestamp: string | null;
}

export interface ProcessingRecord {
  id: string;
  sources: Record<TrackedSource, SourceState>;
  downloaded: TriState;
  downloadSource: string | null;
  downloadTimestamp: string | null;
  contentIngested: TriState;
  parseStages: Record<ParserName, ParseStageState>;
  retryCount: number;
  lastError: string | null;
  lastUpdated: string;
}

export type EventDetail = Record<string, unknown>;

/** An event produced by a mutation, before the store assigns seq and timestamp. */
export interface PendingEvent {
  eventType: TrackerEventType;
  detail: EventDetail;
}

export interface TrackerEvent extends PendingEvent {
  seq: number;
  timestamp: string;
  id: string;
}

export type FetchOutcome =
  | { kind: "success"; path: string; bytes: number; url?: string }
  | { kind: "not-found"; reason: string }
  | { kind: "transient-error"; error: string }
  | { kind: "invalid-content"; error: string };

export interface ExtractedSection {
  title: string;
  content: string;
}

export interface ExtractedContent {
  parser: ParserName;
  title?: string;
  abstract?: string;
  authors?: string[];
  sections: ExtractedSection[];
}

export type ParseOutcome =
  | { status: "success"; outputPath: string; content: ExtractedContent }
  | { status: "failed"; error: string };

export interface AcquisitionPolicy {
  sourceOrder: readonly SourceName[];
  requiredParsers: readonly ParserName[];
  maxRetries: number;
  ingestContent: boolean;
}

function isOneOf<T extends string>(values: readonly T[], value: unknown): value is T {
  const known: readonly string[] = values;
  return typeof value === "string" && known.includes(value);
}

export function isSourceName(value: unknown): value is SourceName {
  return isOneOf(SOURCE_NAMES, value);
}

export function isParserName(value: unknown): value is ParserName {
  return isOneOf(PARSER_NAMES, value);
}

export function isTriState(value: unknown): value is TriState {
  return isOneOf(TRI_STATES, value);
}

export function isParseStatus(value: unknown): value is ParseStatus {
  return isOneOf(PARSE_STATUSES, value);
}

export function isTrackerEventType(value: unknown): value is TrackerEventType {
  return isOneOf(TRACKER_EVENT_TYPES, value);
}
