/**
 * Structured logger for taskstack.
 *
 * Writes JSON log lines to <stateDir>/logs/ and human-readable output to console.
 * Log format: {ts, level, phase, service, msg}
 * Console format: [phase] message
 */
import fs from "node:fs";
import path from "node:path";
import type { LogEntry, LogLevel } from "./types.js";
import { redactSecrets } from "../security/redact.js";

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export interface LoggerContext {
  /** Bootstrap phase (e.g. "brokers"). */
  phase: string;
  /** Broker or process name (e.g. "redis", "worker"). */
  service: string;
}

export interface LoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel;
  /** Directory for JSON log files. Defaults to ./.taskstack/logs. */
  logDir?: string;
  /** Whether to write to file. Defaults to true. */
  fileOutput?: boolean;
  /** Whether to write to console. Defaults to true. */
  consoleOutput?: boolean;
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly logDir: string;
  private readonly fileOutput: boolean;
  private readonly consoleOutput: boolean;
  private logFilePath: string | null = null;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.logDir = options.logDir ?? path.join(process.cwd(), ".taskstack", "logs");
    this.fileOutput = options.fileOutput ?? true;
    this.consoleOutput = options.consoleOutput ?? true;
  }

  fatal(msg: string): void {
    this.log("fatal", msg);
  }

  error(msg: string): void {
    this.log("error", msg);
  }

  warn(msg: string): void {
    this.log("warn", msg);
  }

  info(msg: string): void {
    this.log("info", msg);
  }

  debug(msg: string): void {
    this.log("debug", msg);
  }

  trace(msg: string): void {
    this.log("trace", msg);
  }

  /** Create a child logger with an updated context. */
  child(overrides: Partial<LoggerContext>): Logger {
    return new Logger(
      { ...this.context, ...overrides },
      {
        level: this.level,
        logDir: this.logDir,
        fileOutput: this.fileOutput,
        consoleOutput: this.consoleOutput,
      },
    );
  }

  private log(level: LogLevel, msg: string): void {
    if (LOG_LEVEL_PRIORITY[level] > LOG_LEVEL_PRIORITY[this.level]) return;

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      phase: this.context.phase,
      service: this.context.service,
      msg: redactSecrets(msg),
    };

    if (this.consoleOutput) {
      this.writeConsole(entry);
    }

    if (this.fileOutput) {
      this.writeFile(entry);
    }
  }

  private writeConsole(entry: LogEntry): void {
    const prefix = entry.phase ? `[${entry.phase}]` : "[taskstack]";
    const subject = entry.service ? `${entry.service}: ` : "";
    const line = `${prefix} ${subject}${entry.msg}`;

    if (entry.level === "fatal" || entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  private writeFile(entry: LogEntry): void {
    try {
      if (!this.logFilePath) {
        fs.mkdirSync(this.logDir, { recursive: true });
        const date = entry.ts.slice(0, 10);
        this.logFilePath = path.join(this.logDir, `taskstack-${date}.jsonl`);
      }
      fs.appendFileSync(this.logFilePath, JSON.stringify(entry) + "\n");
    } catch {
      // A log write failure must not abort a bootstrap
    }
  }
}

/** Create a logger with default context. */
export function createLogger(
  context: Partial<LoggerContext> = {},
  options: LoggerOptions = {},
): Logger {
  return new Logger(
    {
      phase: context.phase ?? "",
      service: context.service ?? "",
    },
    options,
  );
}

/** A logger that writes nowhere. Used by library callers and tests that don't care. */
export function createSilentLogger(): Logger {
  return createLogger({}, { fileOutput: false, consoleOutput: false });
}
