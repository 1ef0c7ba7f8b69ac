import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorLines, formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export type RunLoggerOptions = {
  filePath?: string;
  level?: LogLevel;
  console?: boolean;
  debug?: boolean;
};

type LogFailureAction = "open" | "write" | "close";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// =============================================================================
// LOGGER
// =============================================================================

/**
 * Dual-destination run logger: every line goes to the console and is appended to
 * the log file as `<ts> [LEVEL] message`.
 */
export class RunLogger {
  readonly filePath?: string;
  private readonly fileDescriptor: number | null;
  private readonly minLevel: LogLevel;
  private readonly writeConsole: boolean;
  private readonly isDebugEnabled: boolean;
  private closed = false;

  constructor(options: RunLoggerOptions = {}) {
    this.filePath = options.filePath;
    this.minLevel = options.level ?? "info";
    this.writeConsole = options.console ?? true;
    this.isDebugEnabled = options.debug ?? false;
    this.fileDescriptor = options.filePath ? this.openFile(options.filePath) : null;
  }

  debug(message: string): void {
    this.log("debug", message);
  }

  info(message: string): void {
    this.log("info", message);
  }

  warn(message: string): void {
    this.log("warn", message);
  }

  error(message: string): void {
    this.log("error", message);
  }

  log(level: LogLevel, message: string): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) return;

    const line = formatLogLine(level, message);
    if (this.writeConsole) {
      if (level === "warn" || level === "error") {
        console.error(line);
      } else {
        console.log(line);
      }
    }
    this.append(line);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.fileDescriptor === null || !this.filePath) return;

    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err, this.isDebugEnabled));
    }
  }

  private openFile(filePath: string): number | null {
    try {
      fse.ensureDirSync(path.dirname(filePath));
      return fs.openSync(filePath, "a");
    } catch (err) {
      console.warn(formatLogFailureWarning("open", filePath, err, this.isDebugEnabled));
      return null;
    }
  }

  private append(line: string): void {
    if (this.closed || this.fileDescriptor === null || !this.filePath) return;
    try {
      fs.writeSync(this.fileDescriptor, `${line}\n`);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err, this.isDebugEnabled));
    }
  }
}

// =============================================================================
// LINE HELPERS
// =============================================================================

export function formatLogLine(level: LogLevel, message: string, ts: string = isoNow()): string {
  return `${ts} [${level.toUpperCase()}] ${message}`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function formatLogFailureWarning(
  action: LogFailureAction,
  filePath: string,
  error: unknown,
  isDebugEnabled: boolean,
): string {
  const summary = formatErrorMessage(error);
  const actionLabel =
    action === "open"
      ? `open log file ${filePath}`
      : action === "write"
        ? `write log line to ${filePath}`
        : `close log file ${filePath}`;
  const message = `Warning: failed to ${actionLabel}: ${summary}`;

  if (!isDebugEnabled) {
    return message;
  }

  const stackLine = formatErrorLines(error, { mode: "debug" }).find(
    (line) => line.kind === "stack",
  );
  return stackLine ? `${message}\n${stackLine.text}` : message;
}
