import { Logger } from "../observability";
import { TrackerEvent } from "../types";
import { Sink } from "./types";

export abstract class BaseSink implements Sink {
  protected readonly logger?: Logger;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  abstract publishEvents(events: TrackerEvent[]): Promise<void>;

  protected ensureConfigured(name: string, value: string | undefined): string {
    if (!value) {
      throw new Error(`${name} sink is not configured`);
    }
    return value;
  }

  protected warnCleanup(name: string, error: unknown): void {
    this.logger?.warn("sink_cleanup_failed", {
      sink: name,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}
