import { LOG_LEVEL_RANK, LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives each serialized line. Defaults to stderr so stdout stays free for command output. */
  write?: (line: string) => void;
}

const LEVELS_BY_VERBOSITY: LogLevel[] = ["error", "warn", "info", "debug", "trace"];

export function levelFromVerbosity(verbosity: number): LogLevel {
  const index = Math.min(Math.max(Math.trunc(verbosity), 0), LEVELS_BY_VERBOSITY.length - 1);
  return LEVELS_BY_VERBOSITY[index];
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly writeLine: (line: string) => void;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.writeLine = options.write ?? ((line) => console.error(line));
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, { level: this.level, write: this.writeLine });
  }

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVEL_RANK[level] <= LOG_LEVEL_RANK[this.level];
  }

  trace(msg: string, fields?: LogFields): void {
    this.write("trace", msg, fields);
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
    if (!this.isEnabled(level)) {
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

    this.writeLine(JSON.stringify(payload));
  }
}
