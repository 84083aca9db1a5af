import { loadGraphConfig } from "./config/graphConfig.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  payload?: unknown;
}

export interface LoggerOptions {
  /** Entries below this level are dropped. Defaults to `info`. */
  readonly minLevel?: LogLevel;
  /** Destination of the serialised lines. Defaults to stdout. */
  readonly write?: (line: string) => void;
  /** Optional listener invoked every time an entry is emitted. */
  readonly onEntry?: (entry: LogEntry) => void;
}

/**
 * Structured logger that emits one JSON object per line. Graph operations
 * accept it as an optional dependency and stay silent without one.
 */
export class StructuredLogger {
  private readonly minLevel: LogLevel;
  private readonly write: (line: string) => void;
  private readonly entryListener?: (entry: LogEntry) => void;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? "info";
    this.write = options.write ?? ((line) => process.stdout.write(line));
    this.entryListener = options.onEntry;
  }

  debug(message: string, payload?: unknown): void {
    this.log("debug", message, payload);
  }

  info(message: string, payload?: unknown): void {
    this.log("info", message, payload);
  }

  warn(message: string, payload?: unknown): void {
    this.log("warn", message, payload);
  }

  error(message: string, payload?: unknown): void {
    this.log("error", message, payload);
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  private log(level: LogLevel, message: string, payload?: unknown): void {
    if (!this.isEnabled(level)) {
      return;
    }
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(payload !== undefined ? { payload } : {}),
    };
    this.write(`${JSON.stringify(entry, jsonReplacer)}\n`);
    if (this.entryListener) {
      this.entryListener(structuredClone(entry));
    }
  }
}

/** bigint weights are not JSON-serialisable as-is. */
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

/** Builds a stdout logger honouring `WEIGHTGRAPH_LOG_LEVEL`. */
export function createLogger(options: Omit<LoggerOptions, "minLevel"> = {}): StructuredLogger {
  return new StructuredLogger({ ...options, minLevel: loadGraphConfig().logLevel });
}
