import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { RunLogger, formatLogLine } from "./logger.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
  vi.restoreAllMocks();
});

function makeTempDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "run-logger-"));
  tempDirs.push(dir);
  return dir;
}

describe("formatLogLine", () => {
  it("prefixes the timestamp and level", () => {
    expect(formatLogLine("warn", "disk almost full", "2024-01-01T00:00:00.000Z")).toBe(
      "2024-01-01T00:00:00.000Z [WARN] disk almost full",
    );
  });
});

describe("RunLogger", () => {
  it("appends every line to the log file without clobbering earlier runs", () => {
    const logPath = path.join(makeTempDir(), "nested", "run.log");
    fs.mkdirSync(path.dirname(logPath), { recursive: true });
    fs.writeFileSync(logPath, "previous run\n");

    const logger = new RunLogger({ filePath: logPath, console: false });
    logger.info("first");
    logger.error("second");
    logger.close();

    const lines = fs.readFileSync(logPath, "utf8").trim().split("\n");
    expect(lines).toHaveLength(3);
    expect(lines[0]).toBe("previous run");
    expect(lines[1]).toMatch(/^\S+ \[INFO\] first$/);
    expect(lines[2]).toMatch(/^\S+ \[ERROR\] second$/);
  });

  it("drops lines below the configured level", () => {
    const logPath = path.join(makeTempDir(), "run.log");

    const logger = new RunLogger({ filePath: logPath, console: false, level: "info" });
    logger.debug("hidden");
    logger.info("shown");
    logger.close();

    expect(fs.readFileSync(logPath, "utf8")).not.toContain("hidden");
    expect(fs.readFileSync(logPath, "utf8")).toContain("[INFO] shown");
  });

  it("sends warnings and errors to stderr and the rest to stdout", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);

    const logger = new RunLogger({ level: "debug" });
    logger.debug("d");
    logger.info("i");
    logger.warn("w");
    logger.error("e");

    expect(log).toHaveBeenCalledTimes(2);
    expect(error).toHaveBeenCalledTimes(2);
    expect(String(error.mock.calls[0][0])).toMatch(/\[WARN\] w$/);
  });

  it("keeps running with a console warning when the log file cannot be opened", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const blocker = path.join(makeTempDir(), "blocker");
    fs.writeFileSync(blocker, "not a directory");

    const logger = new RunLogger({ filePath: path.join(blocker, "run.log"), console: false });
    logger.info("still fine");
    logger.close();

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0][0])).toMatch(
      /^Warning: failed to open log file .*run\.log: /,
    );
  });
});
