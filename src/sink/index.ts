import type { SinkConfig } from "../config";
import { NoopSink } from "./baseSink";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import { SqsSink } from "./sqsSink";
import type { Sink } from "./types";

export function createSink(config: SinkConfig): Sink {
  switch (config.type) {
    case "local_jsonl":
      return new LocalJsonlSink(config.outputDir);
    case "sqs":
      return new SqsSink({ queueUrl: config.sqsQueueUrl });
    case "http":
      return new HttpSink({ endpoint: config.httpEndpoint, token: config.httpToken });
    case "none":
      return new NoopSink();
  }
}

export * from "./baseSink";
export * from "./httpSink";
export * from "./localJsonlSink";
export * from "./sqsSink";
export type * from "./types";
