import fs from "node:fs";
import path from "node:path";
import { LOG_LEVELS, LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Every line is also appended to this file. */
  filePath?: string;
  /** Set to false to keep lines off stdout/stderr. */
  console?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function describeError(error: unknown): { error: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, stack: error.stack };
  }
  return { error: String(error) };
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly options: LoggerOptions;
  private readonly minRank: number;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.options = options;
    this.minRank = LOG_LEVELS.indexOf(options.level ?? "info");
    if (options.filePath) {
      fs.mkdirSync(path.dirname(path.resolve(options.filePath)), { recursive: true });
    }
  }

  get runId(): string {
    return this.context.runId;
  }

  get filePath(): string | undefined {
    return this.options.filePath;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, this.options);
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
    if (LOG_LEVELS.indexOf(level) < this.minRank) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    const line = JSON.stringify(payload);
    if (this.options.filePath) {
      fs.appendFileSync(this.options.filePath, line + "\n", "utf-8");
    }
    if (this.options.console === false) {
      return;
    }
    if (level === "error") {
      console.error(line);
      return;
    }
    console.log(line);
  }
}
