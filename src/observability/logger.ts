import fs from "node:fs";
import path from "node:path";
import type { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
  /** Every line is also appended here when set. */
  filePath?: string;
}

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
    if (context.filePath) {
      fs.mkdirSync(path.dirname(path.resolve(context.filePath)), { recursive: true });
    }
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    const line = JSON.stringify(payload);
    if (this.context.filePath) {
      fs.appendFileSync(this.context.filePath, `${line}\n`, "utf-8");
    }
    if (level === "error") {
      console.error(line);
      return;
    }
    console.log(line);
  }
}
