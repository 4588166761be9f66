import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { errorMessage } from "../core/errors";
import { checkPdfHeader, PDF_SIGNATURE } from "../core/pdf";
import { Logger } from "../observability";
import { FetchOutcome } from "../types";
import { classifyHttpFailure, FetchLike, HttpResponseLike } from "./http";

export interface PdfDownloaderOptions {
  fetchFn: FetchLike;
  userAgent: string;
  minPdfBytes: number;
  logger?: Logger;
}

export type LookupResult<T> =
  | { kind: "ok"; value: T }
  | { kind: "not-found"; reason: string }
  | { kind: "transient-error"; error: string };

/** Outcome of a lookup step that did not produce a value, in fetch-outcome form. */
export function lookupFailure(result: Exclude<LookupResult<unknown>, { kind: "ok" }>): FetchOutcome {
  return result.kind === "not-found"
    ? { kind: "not-found", reason: result.reason }
    : { kind: "transient-error", error: result.error };
}

/** HTTP plumbing shared by every source: metadata lookups and the final PDF download. */
export class PdfDownloader {
  private readonly fetchFn: FetchLike;
  private readonly userAgent: string;
  private readonly minPdfBytes: number;
  private readonly logger?: Logger;

  constructor(options: PdfDownloaderOptions) {
    this.fetchFn = options.fetchFn;
    this.userAgent = options.userAgent;
    this.minPdfBytes = options.minPdfBytes;
    this.logger = options.logger;
  }

  async getJson(url: string, signal: AbortSignal): Promise<LookupResult<unknown>> {
    const response = await this.request(url, "application/json", signal);
    if (response.kind !== "ok") {
      return response;
    }
    try {
      const body: unknown = JSON.parse(await response.value.text());
      return { kind: "ok", value: body };
    } catch (error) {
      return { kind: "transient-error", error: `invalid JSON from ${url}: ${errorMessage(error)}` };
    }
  }

  async getText(url: string, signal: AbortSignal): Promise<LookupResult<string>> {
    const response = await this.request(url, "text/html,application/xhtml+xml,*/*", signal);
    if (response.kind !== "ok") {
      return response;
    }
    return { kind: "ok", value: await response.value.text() };
  }

  async download(url: string, targetPath: string, signal: AbortSignal): Promise<FetchOutcome> {
    const response = await this.request(url, "application/pdf,*/*", signal);
    if (response.kind !== "ok") {
      return lookupFailure(response);
    }

    const { body } = response.value;
    const resolvedUrl = response.value.url || url;
    if (!body) {
      return { kind: "transient-error", error: `empty response body from ${url}` };
    }

    const absolutePath = path.resolve(targetPath);
    await fs.promises.mkdir(path.dirname(absolutePath), { recursive: true });
    const tempPath = `${absolutePath}.part`;
    const hash = crypto.createHash("sha256");
    let header = Buffer.alloc(0);
    let bytes = 0;

    const readable = Readable.fromWeb(body);
    readable.on("data", (chunk: Uint8Array) => {
      hash.update(chunk);
      bytes += chunk.length;
      if (header.length < PDF_SIGNATURE.length) {
        header = Buffer.concat([header, chunk.subarray(0, PDF_SIGNATURE.length - header.length)]);
      }
    });

    try {
      await pipeline(readable, fs.createWriteStream(tempPath, { flags: "w" }), { signal });
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      return { kind: "transient-error", error: `download from ${url} failed: ${errorMessage(error)}` };
    }

    const problem = checkPdfHeader(header, bytes, this.minPdfBytes);
    if (problem) {
      await fs.promises.rm(tempPath, { force: true });
      this.logger?.warn("pdf_download_invalid", { url, error: problem, bytes });
      return { kind: "invalid-content", error: problem };
    }

    try {
      await fs.promises.rename(tempPath, absolutePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true });
      throw error;
    }

    this.logger?.debug("pdf_download_saved", { url: resolvedUrl, bytes, sha256: hash.digest("hex") });
    return { kind: "success", path: absolutePath, bytes, url: resolvedUrl };
  }

  private async request(url: string, accept: string, signal: AbortSignal): Promise<LookupResult<HttpResponseLike>> {
    let response: HttpResponseLike;
    try {
      response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.userAgent,
          accept,
        },
        signal,
      });
    } catch (error) {
      return { kind: "transient-error", error: `request to ${url} failed: ${errorMessage(error)}` };
    }

    if (!response.ok) {
      const kind = classifyHttpFailure(response.status);
      const message = `HTTP ${response.status} from ${url}`;
      return kind === "not-found" ? { kind, reason: message } : { kind, error: message };
    }
    return { kind: "ok", value: response };
  }
}
