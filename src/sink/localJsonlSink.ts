import fs from "node:fs";
import path from "node:path";
import type { AppConfig } from "../config";
import type { RunOutcome } from "../types";
import { BaseSink } from "./baseSink";

/** Appends one line per saved sheet to `<manifests>/runs.jsonl`; duplicate runs leave the file alone. */
export class LocalJsonlSink extends BaseSink {
  readonly runsPath: string;

  constructor(config: AppConfig) {
    super();
    this.runsPath = path.join(path.resolve(config.outputDirs.manifests), "runs.jsonl");
  }

  async publishOutcome(outcome: RunOutcome): Promise<void> {
    if (outcome.classification !== "NEW") {
      return;
    }
    await fs.promises.mkdir(path.dirname(this.runsPath), { recursive: true });
    await fs.promises.appendFile(this.runsPath, `${JSON.stringify(outcome)}\n`, "utf-8");
  }
}
