import type { AppConfig } from "../config";
import { NoopSink } from "./baseSink";
import { HttpSink } from "./httpSink";
import { LocalJsonlSink } from "./localJsonlSink";
import type { Sink } from "./types";

export function createSink(config: AppConfig): Sink {
  switch (config.sinkType) {
    case "local_jsonl":
      return new LocalJsonlSink(config);
    case "http":
      return new HttpSink({
        endpoint: config.httpSinkEndpoint,
        token: config.httpSinkToken,
        timeoutMs: config.requestTimeoutMs,
        ignoreHttpsErrors: config.ignoreHttpsErrors,
      });
    case "none":
      return new NoopSink();
  }
}

export * from "./types";
export { HttpSink } from "./httpSink";
export { LocalJsonlSink } from "./localJsonlSink";
export { NoopSink } from "./baseSink";
