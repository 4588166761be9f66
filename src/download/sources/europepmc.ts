import { FetchOutcome } from "../../types";
import { lookupFailure, PdfDownloader } from "../pdfDownloader";
import { isRecord, readString, SourceFetcher } from "./types";

const EUROPEPMC_SEARCH = "https://www.ebi.ac.uk/europepmc/webservices/rest/search";

/** PMCID of the first open-access hit in a Europe PMC search response. */
export function openAccessPmcid(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.resultList) || !Array.isArray(body.resultList.result)) {
    return undefined;
  }

  const hits: unknown[] = body.resultList.result;
  for (const hit of hits) {
    if (!isRecord(hit)) {
      continue;
    }
    const pmcid = readString(hit.pmcid);
    if (pmcid && hit.isOpenAccess === "Y") {
      return pmcid;
    }
  }
  return undefined;
}

export class EuropePmcFetcher implements SourceFetcher {
  readonly name = "europepmc";
  private readonly downloader: PdfDownloader;

  constructor(downloader: PdfDownloader) {
    this.downloader = downloader;
  }

  async fetch(doi: string, targetPath: string, signal: AbortSignal): Promise<FetchOutcome> {
    const query = encodeURIComponent(`DOI:"${doi}"`);
    const search = await this.downloader.getJson(`${EUROPEPMC_SEARCH}?query=${query}&format=json&resultType=lite`, signal);
    if (search.kind !== "ok") {
      return lookupFailure(search);
    }

    const pmcid = openAccessPmcid(search.value);
    if (!pmcid) {
      return { kind: "not-found", reason: "no open-access Europe PMC record" };
    }
    return this.downloader.download(`https://europepmc.org/articles/${pmcid}?pdf=render`, targetPath, signal);
  }
}
