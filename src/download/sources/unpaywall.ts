import { FetchOutcome } from "../../types";
import { lookupFailure, PdfDownloader } from "../pdfDownloader";
import { isRecord, readString, SourceFetcher } from "./types";

const UNPAYWALL_BASE_URL = "https://api.unpaywall.org/v2";

/** PDF links from an Unpaywall record, best location first, without duplicates. */
export function unpaywallPdfUrls(body: unknown): string[] {
  if (!isRecord(body) || body.is_oa === false) {
    return [];
  }

  const locations: unknown[] = [body.best_oa_location];
  if (Array.isArray(body.oa_locations)) {
    locations.push(...body.oa_locations);
  }

  const urls: string[] = [];
  for (const location of locations) {
    const url = isRecord(location) ? readString(location.url_for_pdf) : undefined;
    if (url && !urls.includes(url)) {
      urls.push(url);
    }
  }
  return urls;
}

export class UnpaywallFetcher implements SourceFetcher {
  readonly name = "unpaywall";
  private readonly email?: string;
  private readonly downloader: PdfDownloader;

  constructor(email: string | undefined, downloader: PdfDownloader) {
    this.email = email;
    this.downloader = downloader;
  }

  async fetch(doi: string, targetPath: string, signal: AbortSignal): Promise<FetchOutcome> {
    if (!this.email) {
      return { kind: "not-found", reason: "unpaywallEmail is not configured" };
    }

    const lookup = await this.downloader.getJson(
      `${UNPAYWALL_BASE_URL}/${encodeURIComponent(doi)}?email=${encodeURIComponent(this.email)}`,
      signal,
    );
    if (lookup.kind !== "ok") {
      return lookupFailure(lookup);
    }

    const urls = unpaywallPdfUrls(lookup.value);
    if (urls.length === 0) {
      return { kind: "not-found", reason: "no open-access PDF location" };
    }

    let last: FetchOutcome = { kind: "not-found", reason: "no open-access PDF location" };
    for (const url of urls) {
      last = await this.downloader.download(url, targetPath, signal);
      if (last.kind === "success") {
        return last;
      }
    }
    return last;
  }
}
