import fs from "node:fs";
import path from "node:path";
import { LOG_LEVELS, LogFields, LogLevel } from "./types";

export type LogWriter = (line: string, level: LogLevel) => void;

export interface LoggerContext {
  component: string;
  runId: string;
  level?: LogLevel;
  logFile?: string;
  writer?: LogWriter;
}

const stderrWriter: LogWriter = (line) => {
  console.error(line);
};

export class Logger {
  private readonly context: LoggerContext;
  private readonly minLevel: number;

  constructor(context: LoggerContext) {
    this.context = context;
    this.minLevel = LOG_LEVELS.indexOf(context.level ?? "info");
    if (context.logFile) {
      fs.mkdirSync(path.dirname(path.resolve(context.logFile)), { recursive: true });
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
    if (LOG_LEVELS.indexOf(level) < this.minLevel) {
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
    (this.context.writer ?? stderrWriter)(line, level);
    if (this.context.logFile) {
      fs.appendFileSync(path.resolve(this.context.logFile), `${line}\n`, "utf-8");
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
