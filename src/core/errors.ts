export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Network or server trouble at a source; the source stays eligible for a later pass. */
export class TransientFetchError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(message);
    this.name = "TransientFetchError";
    this.source = source;
  }
}

export class TransientParseError extends Error {
  readonly parser: string;

  constructor(parser: string, message: string) {
    super(message);
    this.name = "TransientParseError";
    this.parser = parser;
  }
}

export class InvalidContentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidContentError";
  }
}

export class AttemptTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** A tracker transaction kept losing the write lock after every retry. */
export class StoreContentionError extends Error {
  readonly attempts: number;

  constructor(operation: string, attempts: number, cause: unknown) {
    super(`${operation} could not commit after ${attempts} attempts: ${errorMessage(cause)}`);
    this.name = "StoreContentionError";
    this.attempts = attempts;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
