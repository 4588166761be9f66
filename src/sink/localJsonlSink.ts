import fs from "node:fs";
import path from "node:path";
import { TrackerEvent } from "../types";
import { BaseSink } from "./baseSink";

export class LocalJsonlSink extends BaseSink {
  private readonly eventsPath: string;
  private readonly runId: string;

  constructor(manifestsDir: string, runId: string) {
    super();
    const absoluteDir = path.resolve(manifestsDir);
    fs.mkdirSync(absoluteDir, { recursive: true });
    this.eventsPath = path.join(absoluteDir, "events.jsonl");
    this.runId = runId;
  }

  get filePath(): string {
    return this.eventsPath;
  }

  async publishEvents(events: TrackerEvent[]): Promise<void> {
    if (events.length === 0) {
      return;
    }

    const content = events.map((event) => JSON.stringify({ runId: this.runId, ...event })).join("\n") + "\n";
    await fs.promises.appendFile(this.eventsPath, content, "utf-8");
  }
}
