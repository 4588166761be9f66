import { load } from "cheerio";
import { FetchOutcome } from "../../types";
import { PdfDownloader } from "../pdfDownloader";
import { SourceFetcher } from "./types";

const PDF_LINK_SELECTORS = ["embed#pdf", "iframe#pdf", "embed[type='application/pdf']", "iframe[src*='.pdf']"];

/** Finds the embedded PDF location on a mirror's article page. */
export function findPdfLink(html: string, pageUrl: string): string | undefined {
  const $ = load(html);

  let href: string | undefined;
  for (const selector of PDF_LINK_SELECTORS) {
    href = $(selector).first().attr("src")?.trim();
    if (href) {
      break;
    }
  }
  href ??= $("meta[name='citation_pdf_url']").attr("content")?.trim();
  if (!href) {
    return undefined;
  }

  try {
    const resolved = new URL(href, pageUrl);
    resolved.hash = "";
    return resolved.toString();
  } catch {
    return undefined;
  }
}

export class SciHubFetcher implements SourceFetcher {
  readonly name = "scihub";
  private readonly mirrors: string[];
  private readonly downloader: PdfDownloader;

  constructor(mirrors: string[], downloader: PdfDownloader) {
    this.mirrors = mirrors.map((mirror) => mirror.replace(/\/+$/, ""));
    this.downloader = downloader;
  }

  async fetch(doi: string, targetPath: string, signal: AbortSignal): Promise<FetchOutcome> {
    if (this.mirrors.length === 0) {
      return { kind: "not-found", reason: "no mirrors configured" };
    }

    const transientErrors: string[] = [];
    for (const mirror of this.mirrors) {
      const pageUrl = `${mirror}/${doi}`;
      const page = await this.downloader.getText(pageUrl, signal);
      if (page.kind === "transient-error") {
        transientErrors.push(page.error);
        continue;
      }
      if (page.kind === "not-found") {
        continue;
      }

      const pdfUrl = findPdfLink(page.value, pageUrl);
      if (!pdfUrl) {
        continue;
      }

      const outcome = await this.downloader.download(pdfUrl, targetPath, signal);
      if (outcome.kind === "transient-error") {
        transientErrors.push(outcome.error);
        continue;
      }
      return outcome;
    }

    if (transientErrors.length > 0) {
      return { kind: "transient-error", error: transientErrors.join("; ") };
    }
    return { kind: "not-found", reason: "no PDF link on any mirror" };
  }
}
