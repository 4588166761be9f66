import fs from "node:fs";
import path from "node:path";
import { load } from "cheerio";
import { TransientParseError } from "../core/errors";
import { FileLayout } from "../core/layout";
import { ExtractedContent, ExtractedSection, ParseOutcome } from "../types";
import { writeParsedContent } from "./parsedContent";
import { ParseEngine } from "./types";

interface GrobidResponseLike {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

type GrobidFetch = (
  url: string,
  init: { method: "POST"; body: FormData; signal: AbortSignal },
) => Promise<GrobidResponseLike>;

export interface GrobidParserOptions {
  baseUrl: string;
  fetchFn?: GrobidFetch;
  readFile?: (filePath: string) => Promise<Buffer>;
}

function collapse(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Title, abstract, authors and body sections from a GROBID TEI document. */
export function parseTei(tei: string): Omit<ExtractedContent, "parser"> {
  const $ = load(tei, { xml: true });

  const title = collapse($("teiHeader titleStmt > title").first().text()) || undefined;

  const abstractParagraphs = $("teiHeader profileDesc abstract p")
    .map((_, element) => collapse($(element).text()))
    .get()
    .filter((paragraph) => paragraph.length > 0);
  const abstract =
    abstractParagraphs.length > 0
      ? abstractParagraphs.join(" ")
      : collapse($("teiHeader profileDesc abstract").first().text()) || undefined;

  const authors = $("teiHeader sourceDesc analytic author persName")
    .map((_, element) => {
      const person = $(element);
      const forenames = person
        .find("forename")
        .map((__, forename) => collapse($(forename).text()))
        .get();
      return collapse([...forenames, collapse(person.find("surname").first().text())].join(" "));
    })
    .get()
    .filter((name) => name.length > 0);

  const sections: ExtractedSection[] = [];
  $("text > body > div").each((_, element) => {
    const div = $(element);
    const paragraphs = div
      .children("p")
      .map((__, paragraph) => collapse($(paragraph).text()))
      .get()
      .filter((paragraph) => paragraph.length > 0);
    if (paragraphs.length === 0) {
      return;
    }
    sections.push({ title: collapse(div.children("head").first().text()), content: paragraphs.join("\n\n") });
  });

  return { title, abstract, authors: authors.length > 0 ? authors : undefined, sections };
}

export class GrobidParser implements ParseEngine {
  readonly name = "grobid";
  private readonly layout: FileLayout;
  private readonly endpoint: string;
  private readonly fetchFn: GrobidFetch;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(layout: FileLayout, options: GrobidParserOptions) {
    this.layout = layout;
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/api/processFulltextDocument`;
    this.fetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));
    this.readFile = options.readFile ?? ((filePath) => fs.promises.readFile(filePath));
  }

  async parse(doi: string, pdfPath: string, signal: AbortSignal): Promise<ParseOutcome> {
    const pdf = await this.readFile(pdfPath);
    const form = new FormData();
    form.append("input", new Blob([new Uint8Array(pdf)], { type: "application/pdf" }), path.basename(pdfPath));
    form.append("consolidateHeader", "1");

    const response = await this.fetchFn(this.endpoint, { method: "POST", body: form, signal });
    if (response.status === 503 || response.status === 429) {
      throw new TransientParseError("grobid", `GROBID busy (HTTP ${response.status})`);
    }
    if (response.status === 204) {
      return { status: "failed", error: "GROBID extracted no content" };
    }
    if (!response.ok) {
      return { status: "failed", error: `GROBID HTTP ${response.status}: ${collapse(await response.text()).slice(0, 200)}` };
    }

    const content: ExtractedContent = { parser: "grobid", ...parseTei(await response.text()) };
    if (content.sections.length === 0 && !content.abstract && !content.title) {
      return { status: "failed", error: "GROBID returned an empty TEI document" };
    }

    const outputPath = this.layout.parserOutputPath(doi, "grobid");
    await writeParsedContent(outputPath, doi, content);
    return { status: "success", outputPath, content };
  }
}
