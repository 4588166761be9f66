import { ParserName, SourceName } from "../types";

export interface OutputDirs {
  pdf: string;
  parsed: string;
  manifests: string;
}

export type SinkType = "local_jsonl" | "http" | "rabbit" | "sqs";

export interface AppConfig {
  storePath: string;
  contentDbPath: string;
  outputDirs: OutputDirs;
  sourceOrder: SourceName[];
  requiredParsers: ParserName[];
  maxRetries: number;
  ingestContent: boolean;
  workers: number;
  leaseTtlMs: number;
  attemptTimeoutMs: number;
  parseTimeoutMs: number;
  maxPasses: number;
  passDelayMs: number;
  minPdfBytes: number;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  unpaywallEmail?: string;
  scihubMirrors: string[];
  grobidUrl: string;
  pollIntervalMinutes: number;
  storeBusyRetries: number;
  storeBusyRetryDelayMs: number;
  sinkType: SinkType;
  httpSinkEndpoint?: string;
  httpSinkToken?: string;
  rabbitUrl?: string;
  sqsQueueUrl?: string;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "sourceOrder" | "requiredParsers">> & {
  outputDirs?: Partial<OutputDirs>;
  sourceOrder?: string[];
  requiredParsers?: string[];
};
