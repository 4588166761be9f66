import fs from "node:fs";
import { normalizeDoi } from "../core/doi";
import { Logger } from "../observability";
import { TrackerStore } from "../store";

export interface SeedSummary {
  lines: number;
  valid: number;
  invalid: number;
  duplicates: number;
  created: number;
}

/** Normalizes a DOI list (one per line, `#` comments allowed) into distinct identifiers. */
export function parseDoiList(text: string): { dois: string[]; invalid: string[]; duplicates: number; lines: number } {
  const dois: string[] = [];
  const invalid: string[] = [];
  const seen = new Set<string>();
  let duplicates = 0;
  let lines = 0;

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/(^|\s)#.*$/, "").trim();
    if (!line) {
      continue;
    }
    lines += 1;

    const doi = normalizeDoi(line);
    if (!doi) {
      invalid.push(line);
      continue;
    }
    if (seen.has(doi)) {
      duplicates += 1;
      continue;
    }
    seen.add(doi);
    dois.push(doi);
  }

  return { dois, invalid, duplicates, lines };
}

export async function seedFromText(store: TrackerStore, text: string, logger: Logger): Promise<SeedSummary> {
  const { dois, invalid, duplicates, lines } = parseDoiList(text);
  for (const line of invalid) {
    logger.warn("seed_invalid_doi", { value: line });
  }

  const created = await store.ensureRecords(dois);
  return { lines, valid: dois.length, invalid: invalid.length, duplicates, created };
}

export async function seedFromFile(store: TrackerStore, inputPath: string, logger: Logger): Promise<SeedSummary> {
  const text = await fs.promises.readFile(inputPath, "utf-8");
  return seedFromText(store, text, logger);
}
