import { ExtractedContent } from "../types";

export interface ContentStore {
  /** Persists merged content for an identifier; resolves true once the write is committed. */
  ingest(id: string, contents: ExtractedContent[]): Promise<boolean>;
  has(id: string): Promise<boolean>;
  listIds(): Promise<Set<string>>;
  close(): Promise<void>;
}

export interface MergedPaper {
  title: string | null;
  abstract: string | null;
  authors: string[];
  sections: ExtractedContent["sections"];
  parsingStatus: string;
}
