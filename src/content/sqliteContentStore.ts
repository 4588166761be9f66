import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { ExtractedContent } from "../types";
import { mergeContents } from "./merge";
import { ContentStore } from "./types";

export class SqliteContentStore implements ContentStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    const inMemory = dbPath === ":memory:";
    const location = inMemory ? dbPath : path.resolve(dbPath);
    if (!inMemory) {
      fs.mkdirSync(path.dirname(location), { recursive: true });
    }
    this.db = new Database(location);
    if (!inMemory) {
      this.db.pragma("journal_mode = WAL");
    }
    this.initializeSchema();
  }

  async ingest(id: string, contents: ExtractedContent[]): Promise<boolean> {
    if (contents.length === 0) {
      return false;
    }

    const merged = mergeContents(contents);
    const info = this.db
      .prepare(
        `
        INSERT INTO papers (doi, title, abstract, authors, full_text_sections, parsing_status, updated_at)
        VALUES (@doi, @title, @abstract, @authors, @sections, @parsingStatus, @updatedAt)
        ON CONFLICT(doi) DO UPDATE SET
          title = excluded.title,
          abstract = excluded.abstract,
          authors = excluded.authors,
          full_text_sections = excluded.full_text_sections,
          parsing_status = excluded.parsing_status,
          updated_at = excluded.updated_at
      `,
      )
      .run({
        doi: id,
        title: merged.title,
        abstract: merged.abstract,
        authors: JSON.stringify(merged.authors),
        sections: JSON.stringify(merged.sections),
        parsingStatus: merged.parsingStatus,
        updatedAt: new Date().toISOString(),
      });
    return info.changes > 0;
  }

  async has(id: string): Promise<boolean> {
    return this.db.prepare(`SELECT 1 FROM papers WHERE doi = ?`).get(id) !== undefined;
  }

  async listIds(): Promise<Set<string>> {
    const rows = this.db.prepare(`SELECT doi FROM papers`).all() as Array<{ doi: string }>;
    return new Set(rows.map((row) => row.doi));
  }

  async close(): Promise<void> {
    this.db.close();
  }

  private initializeSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS papers (
        doi TEXT PRIMARY KEY,
        title TEXT NULL,
        abstract TEXT NULL,
        authors TEXT NOT NULL DEFAULT '[]',
        full_text_sections TEXT NOT NULL DEFAULT '[]',
        parsing_status TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }
}
