import path from "node:path";
import { OutputDirs } from "../config";
import { ParserName } from "../types";
import { doiToSafeName } from "./doi";

const FAST_SUFFIX = "_fast.json";

/** Where PDFs and parser outputs for an identifier live on disk. */
export class FileLayout {
  readonly pdfDir: string;
  readonly parsedDir: string;

  constructor(dirs: Pick<OutputDirs, "pdf" | "parsed">) {
    this.pdfDir = path.resolve(dirs.pdf);
    this.parsedDir = path.resolve(dirs.parsed);
  }

  pdfPath(doi: string): string {
    return path.join(this.pdfDir, `${doiToSafeName(doi)}.pdf`);
  }

  parserOutputPath(doi: string, parser: ParserName): string {
    const safeName = doiToSafeName(doi);
    return path.join(this.parsedDir, parser === "fast" ? `${safeName}${FAST_SUFFIX}` : `${safeName}.json`);
  }
}

/** Maps a parse output file name back to its safe name and parser. */
export function classifyParserOutput(fileName: string): { safeName: string; parser: ParserName } | undefined {
  if (fileName.endsWith(FAST_SUFFIX)) {
    return { safeName: fileName.slice(0, -FAST_SUFFIX.length), parser: "fast" };
  }
  if (fileName.endsWith(".json")) {
    return { safeName: fileName.slice(0, -".json".length), parser: "grobid" };
  }
  return undefined;
}
