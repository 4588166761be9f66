import { LogFields, LogLevel, LOG_LEVELS } from "./types";

export type LineWriter = (level: LogLevel, line: string) => void;

export interface LoggerContext {
  component: string;
  runId: string;
  minLevel?: LogLevel;
  /** Fields stamped on every line this logger and its children write. */
  bindings?: LogFields;
  writer?: LineWriter;
}

export function isLogLevel(value: unknown): value is LogLevel {
  const levels: readonly unknown[] = LOG_LEVELS;
  return levels.includes(value);
}

const consoleWriter: LineWriter = (level, line) => {
  if (level === "error") {
    console.error(line);
    return;
  }
  console.log(line);
};

export class Logger {
  private readonly context: LoggerContext;

  constructor(context: LoggerContext) {
    this.context = context;
  }

  child(component: string, bindings?: LogFields): Logger {
    return new Logger({
      ...this.context,
      component,
      bindings: bindings ? { ...this.context.bindings, ...bindings } : this.context.bindings,
    });
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
    const { component, runId, minLevel = "info", bindings, writer = consoleWriter } = this.context;
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(minLevel)) {
      return;
    }

    writer(
      level,
      JSON.stringify({
        ts: new Date().toISOString(),
        level,
        msg,
        component,
        runId,
        ...bindings,
        ...fields,
      }),
    );
  }
}
