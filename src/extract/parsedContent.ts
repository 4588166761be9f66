import fs from "node:fs";
import path from "node:path";
import { ExtractedContent, ExtractedSection, isParserName } from "../types";

interface ParsedFile extends ExtractedContent {
  doi: string;
  parsedAt: string;
}

export async function writeParsedContent(filePath: string, doi: string, content: ExtractedContent): Promise<void> {
  const payload: ParsedFile = { doi, parsedAt: new Date().toISOString(), ...content };
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  const tempPath = `${filePath}.part`;
  await fs.promises.writeFile(tempPath, JSON.stringify(payload, null, 2), "utf-8");
  await fs.promises.rename(tempPath, filePath);
}

function optionalText(value: unknown): string | undefined {
  return typeof value === "string" && value.trim().length > 0 ? value : undefined;
}

function toSections(value: unknown): ExtractedSection[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const items: unknown[] = value;
  const sections: ExtractedSection[] = [];
  for (const item of items) {
    if (typeof item !== "object" || item === null) {
      continue;
    }
    const title = "title" in item && typeof item.title === "string" ? item.title : "";
    const content = "content" in item && typeof item.content === "string" ? item.content : "";
    if (content.length > 0) {
      sections.push({ title, content });
    }
  }
  return sections;
}

/**
 * Reads a parser output file back. Returns undefined when it is missing,
 * truncated or not an output file.
 */
export async function readParsedContent(filePath: string): Promise<ExtractedContent | undefined> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return undefined;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return undefined;
    }
    throw error;
  }
  if (typeof parsed !== "object" || parsed === null || !("parser" in parsed) || !isParserName(parsed.parser)) {
    return undefined;
  }

  const authors =
    "authors" in parsed && Array.isArray(parsed.authors)
      ? parsed.authors.filter((author): author is string => typeof author === "string")
      : undefined;

  return {
    parser: parsed.parser,
    title: "title" in parsed ? optionalText(parsed.title) : undefined,
    abstract: "abstract" in parsed ? optionalText(parsed.abstract) : undefined,
    authors,
    sections: "sections" in parsed ? toSections(parsed.sections) : [],
  };
}

/** Parsed output with at least one non-empty section; anything less is not evidence of a finished parse. */
export async function readUsableParsedContent(filePath: string): Promise<ExtractedContent | undefined> {
  const content = await readParsedContent(filePath);
  return content && content.sections.length > 0 ? content : undefined;
}
