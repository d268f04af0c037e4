import type { RunOutcome } from "../types";

export interface Sink {
  publishOutcome(outcome: RunOutcome): Promise<void>;
}
