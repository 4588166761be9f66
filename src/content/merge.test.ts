import { describe, expect, it } from "vitest";
import { mergeContents } from "./merge";

describe("mergeContents", () => {
  it("prefers GROBID fields and fills gaps from the fast parser", () => {
    const merged = mergeContents([
      {
        parser: "fast",
        title: "Plain title",
        abstract: "Plain abstract",
        sections: [{ title: "", content: "flat text" }],
      },
      {
        parser: "grobid",
        title: "Structured title",
        authors: ["Ada Lovelace"],
        sections: [{ title: "Introduction", content: "structured text" }],
      },
    ]);

    expect(merged).toEqual({
      title: "Structured title",
      abstract: "Plain abstract",
      authors: ["Ada Lovelace"],
      sections: [{ title: "Introduction", content: "structured text" }],
      parsingStatus: "grobid+fast",
    });
  });

  it("falls back to empty values", () => {
    expect(mergeContents([{ parser: "fast", sections: [] }])).toEqual({
      title: null,
      abstract: null,
      authors: [],
      sections: [],
      parsingStatus: "fast",
    });
  });
});
