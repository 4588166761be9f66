import { FetchOutcome } from "../../types";
import { lookupFailure, PdfDownloader } from "../pdfDownloader";
import { isRecord, readString, SourceFetcher } from "./types";

const GRAPH_API = "https://api.semanticscholar.org/graph/v1/paper";

export function openAccessPdfUrl(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.openAccessPdf)) {
    return undefined;
  }
  return readString(body.openAccessPdf.url);
}

export class SemanticScholarFetcher implements SourceFetcher {
  readonly name = "semanticscholar";
  private readonly downloader: PdfDownloader;

  constructor(downloader: PdfDownloader) {
    this.downloader = downloader;
  }

  async fetch(doi: string, targetPath: string, signal: AbortSignal): Promise<FetchOutcome> {
    const paper = await this.downloader.getJson(`${GRAPH_API}/DOI:${doi}?fields=openAccessPdf`, signal);
    if (paper.kind !== "ok") {
      return lookupFailure(paper);
    }

    const url = openAccessPdfUrl(paper.value);
    if (!url) {
      return { kind: "not-found", reason: "no open-access PDF in Semantic Scholar" };
    }
    return this.downloader.download(url, targetPath, signal);
  }
}
