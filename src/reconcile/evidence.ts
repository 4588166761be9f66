import fs from "node:fs";
import path from "node:path";
import { ContentStore } from "../content";
import { normalizeDoi, safeNameToDoi } from "../core/doi";
import { classifyParserOutput, FileLayout } from "../core/layout";
import { inspectPdfFile, PdfFileState } from "../core/pdf";
import { readUsableParsedContent } from "../extract/parsedContent";
import { ParserName } from "../types";

/**
 * What the scan found. File evidence is keyed by safe file name, not DOI:
 * `doiToSafeName` is not reversible once a DOI holds more than one `/`.
 */
export interface EvidenceIndex {
  pdfs: Map<string, "valid" | "invalid">;
  /** Parsers whose output file reads back with at least one section. */
  parserOutputs: Map<string, Set<ParserName>>;
  /** DOIs held by the content store. Undefined when none is configured. */
  contentIds?: Set<string>;
}

export interface EvidenceScanner {
  scan(): Promise<EvidenceIndex>;
  /** Looks at one identifier's PDF again, outside the scan. */
  inspectPdf(id: string): Promise<PdfFileState>;
}

async function listFiles(dir: string): Promise<string[]> {
  try {
    const entries = await fs.promises.readdir(dir, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
}

/** Best guess at the DOI behind a safe name, used only for files no tracked record claims. */
export function doiFromSafeName(safeName: string): string | undefined {
  return normalizeDoi(safeNameToDoi(safeName));
}

export class FilesystemEvidenceScanner implements EvidenceScanner {
  private readonly layout: FileLayout;
  private readonly minPdfBytes: number;
  private readonly contentStore?: ContentStore;

  constructor(layout: FileLayout, minPdfBytes: number, contentStore?: ContentStore) {
    this.layout = layout;
    this.minPdfBytes = minPdfBytes;
    this.contentStore = contentStore;
  }

  async scan(): Promise<EvidenceIndex> {
    const pdfs = new Map<string, "valid" | "invalid">();
    for (const fileName of await listFiles(this.layout.pdfDir)) {
      if (!fileName.toLowerCase().endsWith(".pdf")) {
        continue;
      }
      const safeName = fileName.slice(0, -".pdf".length);
      if (!doiFromSafeName(safeName)) {
        continue;
      }
      const state = await inspectPdfFile(path.join(this.layout.pdfDir, fileName), this.minPdfBytes);
      if (state !== "missing") {
        pdfs.set(safeName, state);
      }
    }

    const parserOutputs = new Map<string, Set<ParserName>>();
    for (const fileName of await listFiles(this.layout.parsedDir)) {
      const output = classifyParserOutput(fileName);
      if (!output || !doiFromSafeName(output.safeName)) {
        continue;
      }
      if (!(await readUsableParsedContent(path.join(this.layout.parsedDir, fileName)))) {
        continue;
      }
      const parsers = parserOutputs.get(output.safeName) ?? new Set<ParserName>();
      parsers.add(output.parser);
      parserOutputs.set(output.safeName, parsers);
    }

    const contentIds = this.contentStore ? await this.contentStore.listIds() : undefined;
    return { pdfs, parserOutputs, contentIds };
  }

  inspectPdf(id: string): Promise<PdfFileState> {
    return inspectPdfFile(this.layout.pdfPath(id), this.minPdfBytes);
  }
}
