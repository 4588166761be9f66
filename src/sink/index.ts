import { AppConfig } from "../config";
import { Logger } from "../observability";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { RabbitSink } from "./rabbitSink";
import { SqsSink } from "./sqsSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string, logger?: Logger): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config.outputDirs.manifests, runId);
    case "sqs":
      return new SqsSink({ queueUrl: config.sqsQueueUrl, runId });
    case "rabbit":
      return new RabbitSink({ connectionUrl: config.rabbitUrl, runId, logger });
    case "http":
      return new HttpSink({ endpoint: config.httpSinkEndpoint, token: config.httpSinkToken, runId, logger });
  }
}

export * from "./types";
export * from "./baseSink";
export * from "./httpSink";
export * from "./localJsonlSink";
export * from "./rabbitSink";
export * from "./sqsSink";
