import { ParserName, PARSER_NAMES, ProcessingRecord, RECONCILED_SOURCE, TRACKED_SOURCES } from "../types";
import { cloneRecord, deriveDownloaded } from "./stateModel";

export interface EvidenceSnapshot {
  /** A PDF with a valid header and size exists for the identifier. */
  validFile: boolean;
  /** A PDF exists but failed validation. */
  invalidFile: boolean;
  parserOutputs: readonly ParserName[];
  /** Undefined when no content store was consulted. */
  inContentStore?: boolean;
}

export interface FieldChange {
  field: string;
  from: string | null;
  to: string | null;
}

export interface ReconcileDecision {
  record: ProcessingRecord;
  changes: FieldChange[];
}

/**
 * Brings existence fields in line with the evidence. Attempt history
 * (retry count, last error) is left untouched.
 */
export function reconcileRecord(record: ProcessingRecord, evidence: EvidenceSnapshot, now: string): ReconcileDecision {
  const next = cloneRecord(record);
  const changes: FieldChange[] = [];

  if (evidence.validFile && record.downloaded !== "yes") {
    next.sources[RECONCILED_SOURCE] = { attempted: "yes", succeeded: "yes" };
    next.downloadSource = RECONCILED_SOURCE;
    next.downloadTimestamp = now;
    changes.push({ field: "downloaded", from: record.downloaded, to: "yes" });
    changes.push({ field: "downloadSource", from: record.downloadSource, to: RECONCILED_SOURCE });
  }

  if (!evidence.validFile && record.downloaded === "yes") {
    for (const source of TRACKED_SOURCES) {
      const state = next.sources[source];
      next.sources[source] = {
        attempted: "unknown",
        succeeded: state.succeeded === "yes" ? "no" : state.succeeded,
      };
    }
    next.downloadSource = null;
    next.downloadTimestamp = null;
    changes.push({ field: "downloaded", from: record.downloaded, to: "no" });
    changes.push({ field: "downloadSource", from: record.downloadSource, to: null });
  }

  for (const parser of PARSER_NAMES) {
    if (evidence.parserOutputs.includes(parser) && record.parseStages[parser].status !== "success") {
      next.parseStages[parser] = { status: "success", timestamp: now };
      changes.push({ field: `${parser}Status`, from: record.parseStages[parser].status, to: "success" });
    }
  }

  if (evidence.inContentStore === true && record.contentIngested !== "yes") {
    next.contentIngested = "yes";
    changes.push({ field: "contentIngested", from: record.contentIngested, to: "yes" });
  }
  if (evidence.inContentStore === false && record.contentIngested === "yes") {
    next.contentIngested = "no";
    changes.push({ field: "contentIngested", from: record.contentIngested, to: "no" });
  }

  next.downloaded = deriveDownloaded(next.sources);
  return { record: next, changes };
}
