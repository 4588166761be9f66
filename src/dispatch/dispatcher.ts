import { errorMessage } from "../core/errors";
import { sleep } from "../core/timeout";
import { didPassWork, PassResult } from "../download/orchestrator";
import { Logger, MetricsRegistry } from "../observability";
import { isInBacklog } from "../state";
import { TrackerStore } from "../store";
import { AcquisitionPolicy } from "../types";
import { processWithConcurrency } from "./concurrency";

export interface PassRunner {
  processIdentifier(id: string): Promise<PassResult>;
}

export interface DispatcherDeps {
  store: TrackerStore;
  policy: AcquisitionPolicy;
  orchestrator: PassRunner;
  runId: string;
  workers: number;
  leaseTtlMs: number;
  passDelayMs: number;
  logger: Logger;
  metrics: MetricsRegistry;
}

export interface DispatchOptions {
  maxDocs?: number;
  maxPasses: number;
}

export interface DispatchSummary {
  rounds: number;
  passes: number;
  attempts: number;
  fetched: number;
  downloaded: number;
  exhausted: number;
  leaseConflicts: number;
  errors: number;
}

export class WorkerDispatcher {
  private readonly deps: DispatcherDeps;

  constructor(deps: DispatcherDeps) {
    this.deps = deps;
  }

  async run(options: DispatchOptions): Promise<DispatchSummary> {
    const { store, policy, workers, passDelayMs, logger } = this.deps;
    const batchSize = Math.max(workers * 2, 1);
    const summary: DispatchSummary = {
      rounds: 0,
      passes: 0,
      attempts: 0,
      fetched: 0,
      downloaded: 0,
      exhausted: 0,
      leaseConflicts: 0,
      errors: 0,
    };

    for (let round = 1; round <= options.maxPasses; round += 1) {
      if (options.maxDocs !== undefined && summary.passes >= options.maxDocs) {
        break;
      }

      summary.rounds = round;
      const seen = new Set<string>();
      const attemptsBefore = summary.attempts;

      while (true) {
        const remaining = options.maxDocs !== undefined ? options.maxDocs - summary.passes : batchSize;
        if (remaining <= 0) {
          break;
        }

        const batch = await store.query((record) => !seen.has(record.id) && isInBacklog(record, policy), {
          limit: Math.min(batchSize, remaining),
        });
        if (batch.length === 0) {
          break;
        }

        for (const record of batch) {
          seen.add(record.id);
        }
        await processWithConcurrency(batch, workers, (record, slot) => this.runPass(record.id, slot, summary));
      }

      const roundAttempts = summary.attempts - attemptsBefore;
      logger.info("dispatch_round_complete", { round, backlog: seen.size, attempts: roundAttempts });

      if (seen.size === 0 || roundAttempts === 0) {
        break;
      }
      if (round < options.maxPasses) {
        await sleep(passDelayMs);
      }
    }

    logger.info("dispatch_complete", { ...summary });
    return summary;
  }

  private async runPass(id: string, slot: number, summary: DispatchSummary): Promise<void> {
    const { store, orchestrator, runId, leaseTtlMs, logger, metrics } = this.deps;
    const owner = `${runId}:${slot}`;

    let acquired: boolean;
    try {
      acquired = await store.acquireLease(id, owner, leaseTtlMs);
    } catch (error) {
      summary.errors += 1;
      metrics.incrementCounter("pass_errors");
      logger.error("dispatch_lease_failed", { doi: id, slot, error: errorMessage(error) });
      return;
    }

    if (!acquired) {
      summary.leaseConflicts += 1;
      metrics.incrementCounter("lease_conflicts");
      logger.debug("dispatch_lease_held_elsewhere", { doi: id, slot });
      return;
    }

    const stopTimer = metrics.startTimer("pass_ms");
    try {
      const result = await orchestrator.processIdentifier(id);
      summary.passes += 1;
      metrics.incrementCounter("passes");
      this.tally(result, summary);
    } catch (error) {
      summary.errors += 1;
      metrics.incrementCounter("pass_errors");
      logger.error("dispatch_pass_failed", { doi: id, slot, error: errorMessage(error) });
    } finally {
      stopTimer();
      await this.release(id, owner);
    }
  }

  private tally(result: PassResult, summary: DispatchSummary): void {
    if (didPassWork(result)) {
      summary.attempts += 1;
    }
    if (result.action === "fetched") {
      summary.fetched += 1;
      if (result.exhausted) {
        summary.exhausted += 1;
      }
      if (result.outcome === "success") {
        summary.downloaded += 1;
      }
    }
  }

  private async release(id: string, owner: string): Promise<void> {
    try {
      await this.deps.store.releaseLease(id, owner);
    } catch (error) {
      this.deps.logger.error("dispatch_lease_release_failed", { doi: id, owner, error: errorMessage(error) });
    }
  }
}
