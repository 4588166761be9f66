const DOI_PREFIXES = [
  "https://doi.org/doi:",
  "doi.org/doi:",
  "https://dx.doi.org/",
  "http://dx.doi.org/",
  "https://www.doi.org/",
  "http://www.doi.org/",
  "https://doi.org/",
  "http://doi.org/",
  "www.doi.org/",
  "dx.doi.org/",
  "doi.org/",
  "doi:",
];

const DOI_PATTERN = /^10\.\d{4,9}\/[!-~]+$/;

/**
 * Strips resolver prefixes, query strings and trailing punctuation.
 * Returns undefined when what is left does not look like a DOI.
 */
export function normalizeDoi(raw: string): string | undefined {
  let normalized = raw.trim();
  const lower = normalized.toLowerCase();
  const prefix = DOI_PREFIXES.find((candidate) => lower.startsWith(candidate));
  if (prefix) {
    normalized = normalized.slice(prefix.length).trim();
  }

  const queryIndex = normalized.indexOf("?");
  if (queryIndex >= 0) {
    normalized = normalized.slice(0, queryIndex);
  }

  normalized = normalized.replace(/[.,;:\s]+$/, "");
  return DOI_PATTERN.test(normalized) ? normalized : undefined;
}

/** File-system name for a DOI: `/` becomes `_`. */
export function doiToSafeName(doi: string): string {
  return doi.replace(/\//g, "_");
}

/**
 * Inverse of doiToSafeName. DOI registrant prefixes never contain `_`, so only
 * the first `_` is the separator; later underscores are kept as they were.
 */
export function safeNameToDoi(safeName: string): string {
  const separator = safeName.indexOf("_");
  if (separator < 0) {
    return safeName;
  }
  return `${safeName.slice(0, separator)}/${safeName.slice(separator + 1)}`;
}
