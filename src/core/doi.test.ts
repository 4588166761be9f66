import { describe, expect, it } from "vitest";
import { doiToSafeName, normalizeDoi, safeNameToDoi } from "./doi";

describe("normalizeDoi", () => {
  it("strips resolver prefixes", () => {
    expect(normalizeDoi("https://doi.org/10.1038/nphys1170")).toBe("10.1038/nphys1170");
    expect(normalizeDoi("https://dx.doi.org/10.1038/nphys1170")).toBe("10.1038/nphys1170");
    expect(normalizeDoi("DOI:10.1038/nphys1170")).toBe("10.1038/nphys1170");
  });

  it("drops query strings and trailing punctuation", () => {
    expect(normalizeDoi("10.1234/abc.def?utm_source=x")).toBe("10.1234/abc.def");
    expect(normalizeDoi(" 10.1234/abc.def., ")).toBe("10.1234/abc.def");
  });

  it("rejects values that are not DOIs", () => {
    expect(normalizeDoi("")).toBeUndefined();
    expect(normalizeDoi("10.12/abc")).toBeUndefined();
    expect(normalizeDoi("arXiv:2101.00001")).toBeUndefined();
    expect(normalizeDoi("10.1234/has space")).toBeUndefined();
  });
});

describe("safe names", () => {
  it("replaces slashes with underscores", () => {
    expect(doiToSafeName("10.1101/2020.01.01.123456")).toBe("10.1101_2020.01.01.123456");
  });

  it("restores only the registrant separator", () => {
    expect(safeNameToDoi("10.1101_2020.01.01.123456")).toBe("10.1101/2020.01.01.123456");
    expect(safeNameToDoi("10.1000_x_y.z")).toBe("10.1000/x_y.z");
    expect(safeNameToDoi("plain")).toBe("plain");
  });
});
