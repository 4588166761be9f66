import { ParseOutcome, ParserName } from "../types";

export interface ParseEngine {
  readonly name: ParserName;
  /** Parses the PDF and writes the extracted content to the parser's output file. */
  parse(doi: string, pdfPath: string, signal: AbortSignal): Promise<ParseOutcome>;
}
