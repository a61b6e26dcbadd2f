// src/utils/logger.ts
//
// Quill Logger (structured, lightweight)
// --------------------------------------
// Used by:
// - runner/cli.ts (stderr)
// - lsp/server.ts (routed to the LSP connection console)
// - language/quill.language.ts (stage timings at debug level)
//
// Usage:
//   const log = createLogger({ name: "quill", level: "info" });
//   log.info("Hello", { x: 1 });
//   const t = log.time("parse"); ... t.end();
//
// Levels:
//   silent < error < warn < info < debug < trace

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug" | "trace";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug", "trace"];

export type LogSink = {
  error: (msg: string) => void;
  warn: (msg: string) => void;
  info: (msg: string) => void;
  debug: (msg: string) => void;
};

export type LoggerOptions = {
  name?: string; // prefix
  level?: LogLevel;

  // Custom sink. If not provided, uses console.
  sink?: LogSink;

  // Whether to include timestamps in log lines
  timestamp?: boolean;

  // If true, include JSON payload after message when payload is provided
  includePayload?: boolean;
};

export type Timer = {
  end: (payload?: unknown) => number;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

const CONSOLE_SINK: LogSink = {
  error: (msg) => console.error(msg),
  warn: (msg) => console.warn(msg),
  info: (msg) => console.log(msg),
  debug: (msg) => console.debug(msg),
};

export class Logger {
  private readonly name: string;
  private level: LogLevel;
  private readonly sink: LogSink;
  private readonly timestamp: boolean;
  private readonly includePayload: boolean;

  constructor(options: LoggerOptions = {}) {
    this.name = options.name ?? "quill";
    this.level = options.level ?? "info";
    this.timestamp = options.timestamp ?? true;
    this.includePayload = options.includePayload ?? true;
    this.sink = options.sink ?? CONSOLE_SINK;
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public error(msg: string, payload?: unknown): void {
    this.emit("error", msg, payload);
  }

  public warn(msg: string, payload?: unknown): void {
    this.emit("warn", msg, payload);
  }

  public info(msg: string, payload?: unknown): void {
    this.emit("info", msg, payload);
  }

  public debug(msg: string, payload?: unknown): void {
    this.emit("debug", msg, payload);
  }

  public trace(msg: string, payload?: unknown): void {
    this.emit("trace", msg, payload);
  }

  /** Child logger sharing level and sink, with a "parent:child" prefix. */
  public child(name: string): Logger {
    return new Logger({
      name: `${this.name}:${name}`,
      level: this.level,
      sink: this.sink,
      timestamp: this.timestamp,
      includePayload: this.includePayload,
    });
  }

  /** Starts a timer; end() logs the elapsed time at debug level and returns it in ms. */
  public time(label: string): Timer {
    const start = performance.now();

    this.trace(`start ${label}`);

    return {
      end: (payload?: unknown) => {
        const ms = performance.now() - start;
        this.debug(`end ${label} (${ms.toFixed(2)}ms)`, payload);
        return ms;
      },
    };
  }

  private emit(level: Exclude<LogLevel, "silent">, msg: string, payload?: unknown): void {
    if (!this.enabled(level)) return;

    const line = this.formatLine(level, msg, payload);

    if (level === "error") this.sink.error(line);
    else if (level === "warn") this.sink.warn(line);
    else if (level === "info") this.sink.info(line);
    else this.sink.debug(line);
  }

  private enabled(level: Exclude<LogLevel, "silent">): boolean {
    return LEVEL_ORDER[level] <= LEVEL_ORDER[this.level];
  }

  private formatLine(level: string, msg: string, payload?: unknown): string {
    const ts = this.timestamp ? `${isoTime()} ` : "";
    const prefix = `[${this.name}]`;
    const lv = level.toUpperCase();

    if (payload === undefined || !this.includePayload) {
      return `${ts}${prefix} ${lv}: ${msg}`;
    }

    return `${ts}${prefix} ${lv}: ${msg} ${safeStringify(payload)}`;
  }
}

/* =========================================================
   Factory
   ========================================================= */

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some((l) => l === s);
}

/* =========================================================
   Utilities
   ========================================================= */

export function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value, (_key, v: unknown) => (typeof v === "bigint" ? `${v}n` : v));
  } catch {
    return String(value);
  }
}

function isoTime(): string {
  // compact ISO without ms
  return new Date().toISOString().replace(/\.\d{3}Z$/, "Z");
}
