import { FetchOutcome, SourceName } from "../../types";

export interface SourceFetcher {
  readonly name: SourceName;
  /** Writes the PDF to `targetPath` on success. Never throws for HTTP-level failures. */
  fetch(doi: string, targetPath: string, signal: AbortSignal): Promise<FetchOutcome>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
