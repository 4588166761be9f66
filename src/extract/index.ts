import { AppConfig } from "../config";
import { FileLayout } from "../core/layout";
import { ParserName } from "../types";
import { FastParser } from "./fastParser";
import { GrobidParser } from "./grobidParser";
import { ParseEngine } from "./types";

export function createParseEngines(config: AppConfig, layout: FileLayout): Record<ParserName, ParseEngine> {
  return {
    fast: new FastParser(layout),
    grobid: new GrobidParser(layout, { baseUrl: config.grobidUrl }),
  };
}

export * from "./types";
export * from "./fastParser";
export * from "./grobidParser";
export * from "./parsedContent";
export * from "./parseStages";
