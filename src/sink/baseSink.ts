import type { RunOutcome } from "../types";
import type { Sink } from "./types";

export abstract class BaseSink implements Sink {
  abstract publishOutcome(outcome: RunOutcome): Promise<void>;

  protected requireSetting(name: string, value: string | undefined): string {
    if (!value) {
      throw new Error(`${name} sink is not configured`);
    }
    return value;
  }
}

export class NoopSink extends BaseSink {
  async publishOutcome(_outcome: RunOutcome): Promise<void> {
    return;
  }
}
