import { FetchOutcome } from "../../types";
import { PdfDownloader } from "../pdfDownloader";
import { SourceFetcher } from "./types";

const ARXIV_DOI_PATTERN = /^10\.48550\/arxiv\.(.+)$/i;

/** arXiv identifier carried by a DataCite arXiv DOI, e.g. 10.48550/arXiv.2101.00001. */
export function arxivIdFromDoi(doi: string): string | undefined {
  return ARXIV_DOI_PATTERN.exec(doi)?.[1];
}

export class ArxivFetcher implements SourceFetcher {
  readonly name = "arxiv";
  private readonly downloader: PdfDownloader;

  constructor(downloader: PdfDownloader) {
    this.downloader = downloader;
  }

  async fetch(doi: string, targetPath: string, signal: AbortSignal): Promise<FetchOutcome> {
    const arxivId = arxivIdFromDoi(doi);
    if (!arxivId) {
      return { kind: "not-found", reason: "not an arXiv DOI" };
    }
    return this.downloader.download(`https://arxiv.org/pdf/${arxivId}`, targetPath, signal);
  }
}
