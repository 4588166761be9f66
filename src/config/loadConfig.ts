import fs from "node:fs";
import path from "node:path";
import { ConfigError } from "../core/errors";
import { isParserName, isSourceName, ParserName, SourceName } from "../types";
import { AppConfig, ConfigOverrides, SinkType } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  storePath: "data/tracker.sqlite",
  contentDbPath: "data/papers.sqlite",
  outputDirs: {
    pdf: "data/pdfs",
    parsed: "data/parsed",
    manifests: "data/manifests",
  },
  sourceOrder: ["unpaywall", "europepmc", "arxiv", "biorxiv", "semanticscholar", "scihub"],
  requiredParsers: ["fast"],
  maxRetries: 10,
  ingestContent: true,
  workers: 4,
  leaseTtlMs: 10 * 60_000,
  attemptTimeoutMs: 120_000,
  parseTimeoutMs: 180_000,
  maxPasses: 10,
  passDelayMs: 2_000,
  minPdfBytes: 1_024,
  userAgent: "doi-acquire/0.1 (+mailto:unset@example.org)",
  ignoreHttpsErrors: false,
  unpaywallEmail: undefined,
  scihubMirrors: [],
  grobidUrl: "http://127.0.0.1:8070",
  pollIntervalMinutes: 60,
  storeBusyRetries: 8,
  storeBusyRetryDelayMs: 50,
  sinkType: "local_jsonl",
};

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigError(`Config file must contain a JSON object: ${absolutePath}`);
  }
  return parsed as ConfigOverrides;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toList(value: string | undefined): string[] | undefined {
  if (!value) {
    return undefined;
  }
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function toSinkType(value: string | undefined, fallback: SinkType): SinkType {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "local_jsonl" || normalized === "http" || normalized === "rabbit" || normalized === "sqs") {
    return normalized;
  }
  return fallback;
}

function toSourceOrder(values: string[]): SourceName[] {
  const order: SourceName[] = [];
  for (const value of values) {
    if (!isSourceName(value)) {
      throw new ConfigError(`Unknown source in sourceOrder: ${value}`);
    }
    if (!order.includes(value)) {
      order.push(value);
    }
  }
  return order;
}

function toParsers(values: string[]): ParserName[] {
  const parsers: ParserName[] = [];
  for (const value of values) {
    if (!isParserName(value)) {
      throw new ConfigError(`Unknown parser in requiredParsers: ${value}`);
    }
    if (!parsers.includes(value)) {
      parsers.push(value);
    }
  }
  if (parsers.length === 0) {
    throw new ConfigError("requiredParsers must name at least one parser");
  }
  return parsers;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    sourceOrder: DEFAULT_CONFIG.sourceOrder,
    requiredParsers: DEFAULT_CONFIG.requiredParsers,
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  const config: AppConfig = {
    ...merged,
    storePath: env.STORE_PATH ?? merged.storePath,
    contentDbPath: env.CONTENT_DB_PATH ?? merged.contentDbPath,
    sourceOrder: toSourceOrder(toList(env.SOURCE_ORDER) ?? fileConfig.sourceOrder ?? merged.sourceOrder),
    requiredParsers: toParsers(toList(env.REQUIRED_PARSERS) ?? fileConfig.requiredParsers ?? merged.requiredParsers),
    maxRetries: toInt(env.MAX_RETRIES, merged.maxRetries),
    ingestContent: toBool(env.INGEST_CONTENT, merged.ingestContent),
    workers: toInt(env.WORKERS, merged.workers),
    leaseTtlMs: toInt(env.LEASE_TTL_MS, merged.leaseTtlMs),
    attemptTimeoutMs: toInt(env.ATTEMPT_TIMEOUT_MS, merged.attemptTimeoutMs),
    parseTimeoutMs: toInt(env.PARSE_TIMEOUT_MS, merged.parseTimeoutMs),
    maxPasses: toInt(env.MAX_PASSES, merged.maxPasses),
    passDelayMs: toInt(env.PASS_DELAY_MS, merged.passDelayMs),
    minPdfBytes: toInt(env.MIN_PDF_BYTES, merged.minPdfBytes),
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    unpaywallEmail: env.UNPAYWALL_EMAIL ?? merged.unpaywallEmail,
    scihubMirrors: toList(env.SCIHUB_MIRRORS) ?? merged.scihubMirrors,
    grobidUrl: env.GROBID_URL ?? merged.grobidUrl,
    pollIntervalMinutes: toInt(env.POLL_INTERVAL_MINUTES, merged.pollIntervalMinutes),
    storeBusyRetries: toInt(env.STORE_BUSY_RETRIES, merged.storeBusyRetries),
    storeBusyRetryDelayMs: toInt(env.STORE_BUSY_RETRY_DELAY_MS, merged.storeBusyRetryDelayMs),
    sinkType: toSinkType(env.SINK_TYPE, merged.sinkType),
    httpSinkEndpoint: env.HTTP_SINK_ENDPOINT ?? merged.httpSinkEndpoint,
    httpSinkToken: env.HTTP_SINK_TOKEN ?? merged.httpSinkToken,
    rabbitUrl: env.RABBIT_URL ?? merged.rabbitUrl,
    sqsQueueUrl: env.SQS_QUEUE_URL ?? merged.sqsQueueUrl,
    outputDirs: {
      pdf: env.OUTPUT_PDF_DIR ?? merged.outputDirs.pdf,
      parsed: env.OUTPUT_PARSED_DIR ?? merged.outputDirs.parsed,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
  };

  if (config.maxRetries < 1) {
    throw new ConfigError("maxRetries must be at least 1");
  }
  if (config.workers < 1) {
    throw new ConfigError("workers must be at least 1");
  }

  return config;
}

export { DEFAULT_CONFIG };
