import { ExtractedContent } from "../types";
import { MergedPaper } from "./types";

/** GROBID output wins over the fast parser field by field; the fast parser fills gaps. */
export function mergeContents(contents: ExtractedContent[]): MergedPaper {
  const ranked = [...contents].sort((left, right) => rank(left) - rank(right));
  const first = <T>(pick: (content: ExtractedContent) => T | undefined, usable: (value: T) => boolean): T | undefined => {
    for (const content of ranked) {
      const value = pick(content);
      if (value !== undefined && usable(value)) {
        return value;
      }
    }
    return undefined;
  };

  return {
    title: first((content) => content.title, (value) => value.length > 0) ?? null,
    abstract: first((content) => content.abstract, (value) => value.length > 0) ?? null,
    authors: first((content) => content.authors, (value) => value.length > 0) ?? [],
    sections: first((content) => content.sections, (value) => value.length > 0) ?? [],
    parsingStatus: ranked.map((content) => content.parser).join("+"),
  };
}

function rank(content: ExtractedContent): number {
  return content.parser === "grobid" ? 0 : 1;
}
