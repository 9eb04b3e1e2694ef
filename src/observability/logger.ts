import type { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export type LogWriter = (level: LogLevel, line: string) => void;

const consoleWriter: LogWriter = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export class Logger {
  private readonly context: LoggerContext;
  private readonly writer: LogWriter;

  constructor(context: LoggerContext, writer: LogWriter = consoleWriter) {
    this.context = context;
    this.writer = writer;
  }

  get runId(): string {
    return this.context.runId;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, this.writer);
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

    this.writer(level, JSON.stringify(payload));
  }
}

export function silentLogger(component = "test"): Logger {
  return new Logger({ component, runId: "run_silent" }, () => undefined);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
