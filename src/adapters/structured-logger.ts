import { AcpRequestError, LoopwrightError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

type LevelName = "debug" | "info" | "warn" | "error";

const LEVEL_NAME: Record<LogLevel, LevelName> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const LEVEL_BY_NAME = new Map<string, LogLevel>([
  ["debug", LogLevel.DEBUG],
  ["info", LogLevel.INFO],
  ["warn", LogLevel.WARN],
  ["warning", LogLevel.WARN],
  ["error", LogLevel.ERROR],
]);

/** Header fields every line starts with; ctx cannot override them. */
const HEADER_KEYS: ReadonlySet<string> = new Set(["time", "level", "msg", "component"]);

export interface StructuredLoggerOptions {
  /** Receives one JSON document per call, without the newline. Defaults to stderr. */
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  clock?: () => Date;
}

/** Map a level name ("debug", "INFO", ...) to a LogLevel; unknown names yield the fallback. */
export function parseLogLevel(name: string | undefined, fallback = LogLevel.INFO): LogLevel {
  if (name === undefined) return fallback;
  return LEVEL_BY_NAME.get(name.trim().toLowerCase()) ?? fallback;
}

/** An Error under `key` becomes the message plus sibling code, rpcCode and stack fields. */
function errorFields(key: string, err: Error): Record<string, unknown> {
  const fields: Record<string, unknown> = { [key]: err.message };
  if (err instanceof LoopwrightError) fields[`${key}Code`] = err.code;
  if (err instanceof AcpRequestError) fields[`${key}RpcCode`] = err.rpcCode;
  fields[`${key}Stack`] = err.stack;
  return fields;
}

/**
 * JSON-lines logger. Writes to stderr by default so stdout stays free for
 * the tool result.
 */
export class StructuredLogger implements Logger {
  private readonly writer: (line: string) => void;
  private readonly threshold: LogLevel;
  private readonly component: string | undefined;
  private readonly clock: () => Date;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.threshold = options.level ?? LogLevel.DEBUG;
    this.component = options.component;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Same writer, level and clock under another component tag. */
  child(component: string): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.threshold,
      component,
      clock: this.clock,
    });
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.threshold;
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, msg, ctx);
  }

  private log(level: LogLevel, msg: string, ctx: Record<string, unknown> = {}): void {
    if (!this.isEnabled(level)) return;

    const header = {
      time: this.clock().toISOString(),
      level: LEVEL_NAME[level],
      msg,
      ...(this.component !== undefined && { component: this.component }),
    };
    const entry: Record<string, unknown> = { ...header };
    for (const [key, value] of Object.entries(ctx)) {
      if (HEADER_KEYS.has(key)) continue;
      if (value instanceof Error) Object.assign(entry, errorFields(key, value));
      else entry[key] = value;
    }

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch {
      // Circular or BigInt context: keep the header only
      line = JSON.stringify({ ...header, serializationError: true });
    }
    this.writer(line);
  }
}
