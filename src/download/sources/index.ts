import { AppConfig } from "../../config";
import { Logger } from "../../observability";
import { SourceName } from "../../types";
import { createFetch, FetchLike } from "../http";
import { PdfDownloader } from "../pdfDownloader";
import { ArxivFetcher } from "./arxiv";
import { BiorxivFetcher } from "./biorxiv";
import { EuropePmcFetcher } from "./europepmc";
import { SciHubFetcher } from "./scihub";
import { SemanticScholarFetcher } from "./semanticScholar";
import { SourceFetcher } from "./types";
import { UnpaywallFetcher } from "./unpaywall";

export function createSourceFetchers(
  config: AppConfig,
  logger: Logger,
  fetchFn: FetchLike = createFetch(config.ignoreHttpsErrors),
): Record<SourceName, SourceFetcher> {
  const downloader = new PdfDownloader({
    fetchFn,
    userAgent: config.userAgent,
    minPdfBytes: config.minPdfBytes,
    logger: logger.child("pdf_downloader"),
  });

  return {
    scihub: new SciHubFetcher(config.scihubMirrors, downloader),
    unpaywall: new UnpaywallFetcher(config.unpaywallEmail, downloader),
    arxiv: new ArxivFetcher(downloader),
    biorxiv: new BiorxivFetcher(downloader),
    europepmc: new EuropePmcFetcher(downloader),
    semanticscholar: new SemanticScholarFetcher(downloader),
  };
}

export * from "./types";
export * from "./scihub";
export * from "./unpaywall";
export * from "./arxiv";
export * from "./biorxiv";
export * from "./europepmc";
export * from "./semanticScholar";
