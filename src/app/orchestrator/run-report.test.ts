import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import type { Batch } from "../../core/batch-planner.js";

import type { BatchOutcome } from "./outcomes.js";
import { RunReportBuilder, computeCompressionRatio, writeRunReport } from "./run-report.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

function makeBatch(index: number, files: Array<[string, number]>): Batch {
  const archiveName = `archive_${index}.7z`;
  return {
    index,
    files: files.map(([relativePath, size]) => ({
      absolutePath: path.join("/data", relativePath),
      relativePath,
      size,
    })),
    archivePath: path.join("/out", archiveName),
    archiveName,
    inputSize: files.reduce((sum, [, size]) => sum + size, 0),
  };
}

function outcome(batch: Batch, overrides: Partial<BatchOutcome>): BatchOutcome {
  return {
    index: batch.index,
    archiveName: batch.archiveName,
    status: "done",
    durationMs: 1,
    ...overrides,
  };
}

const header = {
  inputFolder: "/data",
  outputFolder: "/out",
  totalFiles: 3,
  totalInputSize: 400,
  batchSize: 2,
  compressionLevel: 9,
};

// =============================================================================
// TESTS
// =============================================================================

describe("computeCompressionRatio", () => {
  it("reports the percentage of input saved", () => {
    expect(computeCompressionRatio(400, 100)).toBe(75);
  });

  it("is zero when there was no input", () => {
    expect(computeCompressionRatio(0, 0)).toBe(0);
    expect(computeCompressionRatio(0, 50)).toBe(0);
  });
});

describe("RunReportBuilder", () => {
  it("records successes, counts failures and ignores skipped batches", () => {
    const report = new RunReportBuilder(header);
    const first = makeBatch(1, [
      ["docs/a.txt", 100],
      ["b.txt", 200],
    ]);
    const second = makeBatch(2, [["c.txt", 100]]);
    const third = makeBatch(3, [["d.txt", 5]]);

    report.recordOutcome(second, outcome(second, { status: "failed", error: { kind: "execution", message: "x" } }));
    report.recordOutcome(first, outcome(first, { archiveSize: 100 }));
    report.recordOutcome(third, outcome(third, { status: "skipped" }));

    expect(report.succeeded).toBe(1);
    expect(report.failed).toBe(1);
    expect(report.totalOutputSize).toBe(100);
    expect(report.toJSON("2024-05-01T10:00:00.000Z")).toEqual({
      created_at: "2024-05-01T10:00:00.000Z",
      input_folder: "/data",
      output_folder: "/out",
      total_files: 3,
      total_input_size: 400,
      batch_size: 2,
      compression_level: 9,
      archives: [
        {
          batch_num: 1,
          archive_name: "archive_1.7z",
          file_count: 2,
          input_size: 300,
          output_size: 100,
          files: ["a.txt", "b.txt"],
        },
      ],
      total_output_size: 100,
      compression_ratio: 75,
    });
  });

  it("orders archive records by batch number whatever the completion order", () => {
    const report = new RunReportBuilder(header);
    const batches = [makeBatch(3, [["c", 1]]), makeBatch(1, [["a", 1]]), makeBatch(2, [["b", 1]])];
    for (const batch of batches) {
      report.recordOutcome(batch, outcome(batch, { archiveSize: 1 }));
    }

    expect(report.toJSON("t").archives.map((record) => record.batch_num)).toEqual([1, 2, 3]);
  });

  it("records a null archive size as zero bytes", () => {
    const report = new RunReportBuilder(header);
    const batch = makeBatch(1, [["a", 10]]);

    report.recordOutcome(batch, outcome(batch, { archiveSize: null }));

    expect(report.toJSON("t").archives[0].output_size).toBe(0);
    expect(report.succeeded).toBe(1);
  });
});

describe("writeRunReport", () => {
  it("writes indented JSON with a trailing newline, creating parent folders", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "run-report-"));
    tempDirs.push(dir);
    const reportPath = path.join(dir, "nested", "report.json");
    const report = new RunReportBuilder({ ...header, totalInputSize: 0 }).toJSON("t");

    await writeRunReport(reportPath, report);

    const raw = fs.readFileSync(reportPath, "utf8");
    expect(raw.endsWith("}\n")).toBe(true);
    expect(raw.split("\n")[1]).toBe('  "created_at": "t",');
    expect(JSON.parse(raw)).toEqual(report);
  });
});
