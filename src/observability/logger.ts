import { LogFields, LogLevel, LogThreshold } from "./types";

/** Destination for rendered log lines; errors go to `err`. */
export interface LogWriter {
  out(line: string): void;
  err(line: string): void;
}

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogThreshold;
  bound?: LogFields;
  writer?: LogWriter;
}

const SEVERITY: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const consoleWriter: LogWriter = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export function parseLogThreshold(value: string | undefined, fallback: LogThreshold): LogThreshold {
  const normalized = value?.trim().toLowerCase();
  switch (normalized) {
    case "debug":
    case "info":
    case "warn":
    case "error":
    case "silent":
      return normalized;
    default:
      return fallback;
  }
}

/** One JSON object per line, tagged with the run and the emitting component. */
export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  get level(): LogThreshold {
    return this.context.minLevel ?? "info";
  }

  child(component: string): Logger {
    return new Logger({ ...this.context, component });
  }

  /** Returns a logger that adds `fields` to every line. */
  with(fields: LogFields): Logger {
    return new Logger({ ...this.context, bound: { ...this.context.bound, ...fields } });
  }

  debug(msg: string, fields?: LogFields): void {
    this.emit("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.emit("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.emit("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.emit("error", msg, fields);
  }

  private emit(level: LogLevel, msg: string, fields?: LogFields): void {
    if (SEVERITY[level] < SEVERITY[this.level]) {
      return;
    }

    const line = JSON.stringify({
      ts: new Date().toISOString(),
      level,
      runId: this.context.runId,
      component: this.context.component,
      msg,
      ...this.context.bound,
      ...fields,
    });
    const writer = this.context.writer ?? consoleWriter;
    if (level === "error") {
      writer.err(line);
    } else {
      writer.out(line);
    }
  }
}
