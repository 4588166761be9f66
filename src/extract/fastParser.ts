import fs from "node:fs";
import { PDFParse } from "pdf-parse";
import { errorMessage } from "../core/errors";
import { FileLayout } from "../core/layout";
import { ExtractedContent, ExtractedSection, ParseOutcome } from "../types";
import { writeParsedContent } from "./parsedContent";
import { ParseEngine } from "./types";

interface ParserLike {
  getText(): Promise<{ text: string; total: number }>;
  destroy(): Promise<void>;
}

export interface FastParserDeps {
  parserFactory?: (data: Buffer) => ParserLike;
  readFile?: (filePath: string) => Promise<Buffer>;
}

const HEADING_PATTERN = /^(?:\d+(?:\.\d+)*\.?\s+)?[A-Z][A-Za-z ,&-]{2,79}$/;

function isHeading(paragraph: string): boolean {
  return !paragraph.includes("\n") && HEADING_PATTERN.test(paragraph) && !paragraph.endsWith(".");
}

/**
 * Splits plain text into paragraphs on blank lines and groups them under
 * heading-like lines. The first line is taken as the title and a paragraph
 * opening with "Abstract" as the abstract.
 */
export function structureText(text: string): Omit<ExtractedContent, "parser"> {
  const paragraphs = text
    .replace(/\r\n/g, "\n")
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);

  const title = paragraphs[0]?.split("\n")[0]?.trim();
  let abstract: string | undefined;
  const sections: ExtractedSection[] = [];
  let current: { title: string; parts: string[] } = { title: "", parts: [] };

  const flush = (): void => {
    if (current.parts.length > 0) {
      sections.push({ title: current.title, content: current.parts.join("\n\n") });
    }
  };

  for (const paragraph of paragraphs.slice(1)) {
    const abstractMatch = /^abstract[:.\s-]*/i.exec(paragraph);
    if (!abstract && abstractMatch) {
      const body = paragraph.slice(abstractMatch[0].length).trim();
      if (body.length > 0) {
        abstract = body.replace(/\s*\n\s*/g, " ");
        continue;
      }
    }
    if (isHeading(paragraph)) {
      flush();
      current = { title: paragraph, parts: [] };
      continue;
    }
    current.parts.push(paragraph);
  }
  flush();

  return { title, abstract, sections };
}

export class FastParser implements ParseEngine {
  readonly name = "fast";
  private readonly layout: FileLayout;
  private readonly parserFactory: (data: Buffer) => ParserLike;
  private readonly readFile: (filePath: string) => Promise<Buffer>;

  constructor(layout: FileLayout, deps?: FastParserDeps) {
    this.layout = layout;
    this.parserFactory = deps?.parserFactory ?? ((data) => new PDFParse({ data }));
    this.readFile = deps?.readFile ?? ((filePath) => fs.promises.readFile(filePath));
  }

  async parse(doi: string, pdfPath: string, signal: AbortSignal): Promise<ParseOutcome> {
    const pdfBuffer = await this.readFile(pdfPath);
    const parser = this.parserFactory(pdfBuffer);

    let text: string;
    try {
      text = (await parser.getText()).text;
    } catch (error) {
      return { status: "failed", error: `pdf-parse failed: ${errorMessage(error)}` };
    } finally {
      await parser.destroy();
    }

    if (signal.aborted) {
      return { status: "failed", error: "parse aborted" };
    }

    const content: ExtractedContent = { parser: "fast", ...structureText(text) };
    if (content.sections.length === 0 && !content.abstract) {
      return { status: "failed", error: "no text extracted" };
    }

    const outputPath = this.layout.parserOutputPath(doi, "fast");
    await writeParsedContent(outputPath, doi, content);
    return { status: "success", outputPath, content };
  }
}
