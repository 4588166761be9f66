import { FetchOutcome } from "../../types";
import { lookupFailure, PdfDownloader } from "../pdfDownloader";
import { isRecord, SourceFetcher } from "./types";

const BIORXIV_API = "https://api.biorxiv.org/details/biorxiv";

/** Highest posted version in a bioRxiv details response. */
export function latestBiorxivVersion(body: unknown): number | undefined {
  if (!isRecord(body) || !Array.isArray(body.collection)) {
    return undefined;
  }

  const entries: unknown[] = body.collection;
  let latest: number | undefined;
  for (const entry of entries) {
    if (!isRecord(entry)) {
      continue;
    }
    const version = Number(entry.version);
    if (Number.isInteger(version) && version > 0 && (latest === undefined || version > latest)) {
      latest = version;
    }
  }
  return latest;
}

export class BiorxivFetcher implements SourceFetcher {
  readonly name = "biorxiv";
  private readonly downloader: PdfDownloader;

  constructor(downloader: PdfDownloader) {
    this.downloader = downloader;
  }

  async fetch(doi: string, targetPath: string, signal: AbortSignal): Promise<FetchOutcome> {
    if (!doi.startsWith("10.1101/")) {
      return { kind: "not-found", reason: "not a bioRxiv DOI" };
    }

    const details = await this.downloader.getJson(`${BIORXIV_API}/${doi}`, signal);
    if (details.kind !== "ok") {
      return lookupFailure(details);
    }

    const version = latestBiorxivVersion(details.value);
    if (version === undefined) {
      return { kind: "not-found", reason: "bioRxiv has no record for this DOI" };
    }
    return this.downloader.download(`https://www.biorxiv.org/content/${doi}v${version}.full.pdf`, targetPath, signal);
  }
}
