import {
  AcquisitionPolicy,
  FetchOutcome,
  ParseOutcome,
  ParserName,
  ParseStageState,
  ProcessingRecord,
  SourceName,
  SourceState,
  TrackedSource,
  TRACKED_SOURCES,
  TriState,
} from "../types";

function unknownSource(): SourceState {
  return { attempted: "unknown", succeeded: "unknown" };
}

function notAttempted(): ParseStageState {
  return { status: "not_attempted", timestamp: null };
}

export function createDefaultRecord(id: string, now: string): ProcessingRecord {
  return {
    id,
    sources: {
      scihub: unknownSource(),
      unpaywall: unknownSource(),
      arxiv: unknownSource(),
      biorxiv: unknownSource(),
      europepmc: unknownSource(),
      semanticscholar: unknownSource(),
      reconciled: unknownSource(),
    },
    downloaded: "unknown",
    downloadSource: null,
    downloadTimestamp: null,
    contentIngested: "unknown",
    parseStages: {
      fast: notAttempted(),
      grobid: notAttempted(),
    },
    retryCount: 0,
    lastError: null,
    lastUpdated: now,
  };
}

/** Copies the nested maps so a transition never aliases its input. */
export function cloneRecord(record: ProcessingRecord): ProcessingRecord {
  return {
    ...record,
    sources: {
      scihub: { ...record.sources.scihub },
      unpaywall: { ...record.sources.unpaywall },
      arxiv: { ...record.sources.arxiv },
      biorxiv: { ...record.sources.biorxiv },
      europepmc: { ...record.sources.europepmc },
      semanticscholar: { ...record.sources.semanticscholar },
      reconciled: { ...record.sources.reconciled },
    },
    parseStages: {
      fast: { ...record.parseStages.fast },
      grobid: { ...record.parseStages.grobid },
    },
  };
}

export function deriveDownloaded(sources: Record<TrackedSource, SourceState>): TriState {
  const outcomes = TRACKED_SOURCES.map((source) => sources[source].succeeded);
  if (outcomes.includes("yes")) {
    return "yes";
  }
  if (outcomes.includes("no")) {
    return "no";
  }
  return "unknown";
}

function withDerivedDownload(record: ProcessingRecord): ProcessingRecord {
  return { ...record, downloaded: deriveDownloaded(record.sources) };
}

export function nextSourceToTry(record: ProcessingRecord, sourceOrder: readonly SourceName[]): SourceName | null {
  if (record.downloaded === "yes") {
    return null;
  }
  return sourceOrder.find((source) => record.sources[source].attempted !== "yes") ?? null;
}

export function applyFetchOutcome(
  record: ProcessingRecord,
  source: SourceName,
  outcome: FetchOutcome,
  now: string,
): ProcessingRecord {
  const next = cloneRecord(record);

  switch (outcome.kind) {
    case "success":
      next.sources[source] = { attempted: "yes", succeeded: "yes" };
      next.downloadSource = source;
      next.downloadTimestamp = now;
      next.lastError = null;
      break;
    case "not-found":
    case "invalid-content":
      if (next.sources[source].succeeded !== "yes") {
        next.sources[source] = { attempted: "yes", succeeded: "no" };
      }
      next.retryCount += 1;
      next.lastError = `${source}: ${outcome.kind === "not-found" ? outcome.reason : outcome.error}`;
      break;
    case "transient-error":
      next.retryCount += 1;
      next.lastError = `${source}: ${outcome.error}`;
      break;
  }

  return withDerivedDownload(next);
}

export function applyParseOutcome(
  record: ProcessingRecord,
  parser: ParserName,
  outcome: ParseOutcome,
  policy: AcquisitionPolicy,
  now: string,
): ProcessingRecord {
  if (record.parseStages[parser].status === "success") {
    return record;
  }

  const next = cloneRecord(record);
  if (outcome.status === "success") {
    next.parseStages[parser] = { status: "success", timestamp: now };
    return next;
  }

  next.retryCount += 1;
  next.lastError = `${parser}: ${outcome.error}`;
  next.parseStages[parser] = {
    status: next.retryCount < policy.maxRetries ? "not_attempted" : "failed",
    timestamp: now,
  };
  return next;
}

/** A failed content hand-off counts against the same retry budget as fetches and parses. */
export function applyIngestOutcome(record: ProcessingRecord, error: string | null): ProcessingRecord {
  const next = cloneRecord(record);
  if (error === null) {
    next.contentIngested = "yes";
    return next;
  }
  next.contentIngested = "no";
  next.retryCount += 1;
  next.lastError = `ingest: ${error}`;
  return next;
}

export function isExhausted(record: ProcessingRecord, policy: AcquisitionPolicy): boolean {
  if (record.retryCount >= policy.maxRetries) {
    return true;
  }
  return record.downloaded !== "yes" && policy.sourceOrder.every((source) => record.sources[source].attempted === "yes");
}

export function isFullyProcessed(record: ProcessingRecord, policy: AcquisitionPolicy): boolean {
  if (record.downloaded !== "yes") {
    return false;
  }
  if (!policy.requiredParsers.every((parser) => record.parseStages[parser].status === "success")) {
    return false;
  }
  return !policy.ingestContent || record.contentIngested === "yes";
}

export function parsersSettled(record: ProcessingRecord, policy: AcquisitionPolicy): boolean {
  return policy.requiredParsers.every((parser) => record.parseStages[parser].status !== "not_attempted");
}

export function isIngestPending(record: ProcessingRecord, policy: AcquisitionPolicy): boolean {
  return (
    policy.ingestContent &&
    record.downloaded === "yes" &&
    record.contentIngested !== "yes" &&
    parsersSettled(record, policy) &&
    policy.requiredParsers.some((parser) => record.parseStages[parser].status === "success")
  );
}

export function hasPendingWork(record: ProcessingRecord, policy: AcquisitionPolicy): boolean {
  if (record.downloaded !== "yes") {
    return nextSourceToTry(record, policy.sourceOrder) !== null;
  }
  return !parsersSettled(record, policy) || isIngestPending(record, policy);
}

export function isInBacklog(record: ProcessingRecord, policy: AcquisitionPolicy): boolean {
  return !isFullyProcessed(record, policy) && !isExhausted(record, policy) && hasPendingWork(record, policy);
}

/** Neither done nor exhausted, yet nothing left to run automatically (e.g. a required parser ended failed). */
export function isStalled(record: ProcessingRecord, policy: AcquisitionPolicy): boolean {
  return !isFullyProcessed(record, policy) && !isExhausted(record, policy) && !hasPendingWork(record, policy);
}

export function resetRecord(record: ProcessingRecord, now: string): ProcessingRecord {
  return createDefaultRecord(record.id, now);
}
