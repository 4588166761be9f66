import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ReadableStream } from "node:stream/web";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FetchLike, HttpResponseLike } from "./http";
import { PdfDownloader } from "./pdfDownloader";

function streamOf(chunks: Buffer[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(new Uint8Array(chunk));
      }
      controller.close();
    },
  });
}

function stubResponse(status: number, body: string | Buffer, url = ""): HttpResponseLike {
  const data = typeof body === "string" ? Buffer.from(body, "utf-8") : body;
  return {
    ok: status >= 200 && status < 300,
    status,
    url,
    headers: { get: () => null },
    body: streamOf([data]),
    text: async () => data.toString("utf-8"),
  };
}

function pdfBody(size = 2048): Buffer {
  return Buffer.concat([Buffer.from("%PDF-1.4\n"), Buffer.alloc(size, 32)]);
}

describe("PdfDownloader", () => {
  let tmpDir: string;
  const signal = new AbortController().signal;

  beforeEach(async () => {
    tmpDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), "downloader-"));
  });

  afterEach(async () => {
    await fs.promises.rm(tmpDir, { recursive: true, force: true });
  });

  function downloader(fetchFn: FetchLike): PdfDownloader {
    return new PdfDownloader({ fetchFn, userAgent: "doi-acquire-test", minPdfBytes: 1_024 });
  }

  it("writes a valid PDF to the target path", async () => {
    const fetchFn = vi.fn<FetchLike>(async (url) => stubResponse(200, pdfBody(), url));
    const target = path.join(tmpDir, "pdfs", "10.1000_a.pdf");

    const outcome = await downloader(fetchFn).download("https://repo.example/a.pdf", target, signal);

    expect(outcome).toEqual({ kind: "success", path: target, bytes: 2057, url: "https://repo.example/a.pdf" });
    expect((await fs.promises.readFile(target)).subarray(0, 5).toString("latin1")).toBe("%PDF-");
    expect(fs.existsSync(`${target}.part`)).toBe(false);
    expect(fetchFn.mock.calls[0][1].headers).toEqual({ "user-agent": "doi-acquire-test", accept: "application/pdf,*/*" });
  });

  it("rejects bytes that are not a PDF", async () => {
    const fetchFn: FetchLike = async (url) => stubResponse(200, "<html>sign in</html>", url);
    const target = path.join(tmpDir, "a.pdf");

    const outcome = await downloader(fetchFn).download("https://repo.example/a.pdf", target, signal);

    expect(outcome).toEqual({ kind: "invalid-content", error: "missing %PDF- header" });
    expect(fs.existsSync(target)).toBe(false);
    expect(fs.existsSync(`${target}.part`)).toBe(false);
  });

  it("streams a body delivered in small chunks", async () => {
    const chunks = [Buffer.from("%P"), Buffer.from("DF-1.7\n"), Buffer.alloc(600, 32), Buffer.alloc(600, 32)];
    const fetchFn: FetchLike = async (url) => ({ ...stubResponse(200, "", url), body: streamOf(chunks) });
    const target = path.join(tmpDir, "10.1093_nar_gkx123.pdf");

    const outcome = await downloader(fetchFn).download("https://repo.example/b.pdf", target, signal);

    expect(outcome).toEqual({ kind: "success", path: target, bytes: 1210, url: "https://repo.example/b.pdf" });
    expect((await fs.promises.stat(target)).size).toBe(1210);
  });

  it("reports a response without a body as transient", async () => {
    const fetchFn: FetchLike = async (url) => ({ ...stubResponse(200, "", url), body: null });

    const outcome = await downloader(fetchFn).download("https://repo.example/c.pdf", path.join(tmpDir, "c.pdf"), signal);

    expect(outcome).toEqual({ kind: "transient-error", error: "empty response body from https://repo.example/c.pdf" });
  });

  it("removes the partial file when the download is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const fetchFn: FetchLike = async (url) => stubResponse(200, pdfBody(), url);
    const target = path.join(tmpDir, "d.pdf");

    const outcome = await downloader(fetchFn).download("https://repo.example/d.pdf", target, controller.signal);

    expect(outcome.kind).toBe("transient-error");
    expect(fs.existsSync(target)).toBe(false);
    expect(fs.existsSync(`${target}.part`)).toBe(false);
  });

  it("rejects a PDF below the minimum size", async () => {
    const fetchFn: FetchLike = async (url) => stubResponse(200, pdfBody(10), url);

    const outcome = await downloader(fetchFn).download("https://repo.example/a.pdf", path.join(tmpDir, "a.pdf"), signal);

    expect(outcome).toEqual({ kind: "invalid-content", error: "file too small (19 < 1024 bytes)" });
  });

  it("maps HTTP failures to misses or transient errors", async () => {
    const statuses = new Map([
      ["https://repo.example/404", 404],
      ["https://repo.example/403", 403],
      ["https://repo.example/429", 429],
      ["https://repo.example/502", 502],
    ]);
    const fetchFn: FetchLike = async (url) => stubResponse(statuses.get(url) ?? 200, "", url);
    const target = path.join(tmpDir, "a.pdf");
    const client = downloader(fetchFn);

    expect(await client.download("https://repo.example/404", target, signal)).toEqual({
      kind: "not-found",
      reason: "HTTP 404 from https://repo.example/404",
    });
    expect((await client.download("https://repo.example/403", target, signal)).kind).toBe("not-found");
    expect((await client.download("https://repo.example/429", target, signal)).kind).toBe("transient-error");
    expect(await client.download("https://repo.example/502", target, signal)).toEqual({
      kind: "transient-error",
      error: "HTTP 502 from https://repo.example/502",
    });
  });

  it("reports a network failure as transient", async () => {
    const fetchFn: FetchLike = async () => {
      throw new Error("ECONNRESET");
    };

    const result = await downloader(fetchFn).getJson("https://api.example/x", signal);

    expect(result).toEqual({ kind: "transient-error", error: "request to https://api.example/x failed: ECONNRESET" });
  });

  it("parses JSON bodies", async () => {
    const fetchFn: FetchLike = async (url) => stubResponse(200, JSON.stringify({ ok: 1 }), url);
    expect(await downloader(fetchFn).getJson("https://api.example/x", signal)).toEqual({ kind: "ok", value: { ok: 1 } });
  });
});
