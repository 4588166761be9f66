import { doiToSafeName } from "../core/doi";
import { Logger, MetricsRegistry } from "../observability";
import { EvidenceSnapshot, FieldChange, reconcileRecord } from "../state";
import { TrackerStore } from "../store";
import { ProcessingRecord } from "../types";
import { doiFromSafeName, EvidenceIndex, EvidenceScanner } from "./evidence";

export interface ReconcilerDeps {
  store: TrackerStore;
  scanner: EvidenceScanner;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface ReconcileSummary {
  checked: number;
  created: number;
  fixed: number;
  fixesByField: Record<string, number>;
}

export function snapshotFor(index: EvidenceIndex, id: string): EvidenceSnapshot {
  const safeName = doiToSafeName(id);
  const pdf = index.pdfs.get(safeName);
  return {
    validFile: pdf === "valid",
    invalidFile: pdf === "invalid",
    parserOutputs: [...(index.parserOutputs.get(safeName) ?? [])],
    inContentStore: index.contentIds ? index.contentIds.has(id) : undefined,
  };
}

/**
 * Identifiers the file evidence belongs to. A safe name claimed by a tracked
 * record resolves to that record; only unclaimed names are turned back into DOIs.
 */
export function evidenceOwners(index: EvidenceIndex, tracked: readonly ProcessingRecord[]): Set<string> {
  const idsBySafeName = new Map<string, string[]>();
  for (const record of tracked) {
    const safeName = doiToSafeName(record.id);
    idsBySafeName.set(safeName, [...(idsBySafeName.get(safeName) ?? []), record.id]);
  }

  const owners = new Set<string>(index.contentIds ?? []);
  for (const safeName of new Set([...index.pdfs.keys(), ...index.parserOutputs.keys()])) {
    const claimedBy = idsBySafeName.get(safeName);
    if (claimedBy) {
      claimedBy.forEach((id) => owners.add(id));
      continue;
    }
    const doi = doiFromSafeName(safeName);
    if (doi) {
      owners.add(doi);
    }
  }
  return owners;
}

/**
 * One reconciliation pass. Disk and the content store decide what exists;
 * attempt history in the tracker is never rewritten.
 */
export class Reconciler {
  private readonly deps: ReconcilerDeps;

  constructor(deps: ReconcilerDeps) {
    this.deps = deps;
  }

  async run(): Promise<ReconcileSummary> {
    const { store, scanner, logger, metrics } = this.deps;
    const index = await scanner.scan();

    const tracked = await store.query(() => true);
    const evidenceIds = evidenceOwners(index, tracked);
    const created = await store.ensureRecords([...evidenceIds]);

    const claimed = tracked.filter((record) => record.downloaded === "yes" || record.contentIngested === "yes");
    const ids = new Set<string>([...evidenceIds, ...claimed.map((record) => record.id)]);

    const summary: ReconcileSummary = { checked: ids.size, created, fixed: 0, fixesByField: {} };
    for (const id of [...ids].sort()) {
      const snapshot = await this.currentSnapshot(index, id);
      let changes: FieldChange[] = [];
      const result = await store.applyMutation(id, (current, now) => {
        if (current.downloaded === "yes" && snapshot.observedDownloaded !== "yes" && !snapshot.evidence.validFile) {
          // downloaded after the scan; the next pass sees its file
          return null;
        }
        const decision = reconcileRecord(current, snapshot.evidence, now);
        changes = decision.changes;
        if (changes.length === 0) {
          return null;
        }
        return {
          record: decision.record,
          events: [{ eventType: "reconciliation-fix", detail: { changes, evidence: { ...snapshot.evidence } } }],
        };
      });
      if (!result.changed) {
        continue;
      }

      summary.fixed += 1;
      metrics.incrementCounter("reconcile_fixes");
      for (const change of changes) {
        summary.fixesByField[change.field] = (summary.fixesByField[change.field] ?? 0) + 1;
      }
      logger.info("reconcile_fix_applied", { doi: id, changes });
    }

    logger.info("reconcile_complete", { ...summary });
    return summary;
  }

  /**
   * Scan evidence, except that a record believed downloaded has its file
   * checked again now: a worker may have written it after the scan.
   */
  private async currentSnapshot(
    index: EvidenceIndex,
    id: string,
  ): Promise<{ evidence: EvidenceSnapshot; observedDownloaded: ProcessingRecord["downloaded"] }> {
    const evidence = snapshotFor(index, id);
    const observed = await this.deps.store.get(id);
    if (observed.downloaded !== "yes" || evidence.validFile) {
      return { evidence, observedDownloaded: observed.downloaded };
    }
    const fresh = await this.deps.scanner.inspectPdf(id);
    return {
      evidence: { ...evidence, validFile: fresh === "valid", invalidFile: fresh === "invalid" },
      observedDownloaded: observed.downloaded,
    };
  }
}
