import { describe, expect, it } from "vitest";

import type { BatchOutcome } from "./outcomes.js";
import {
  ConsoleProgressReporter,
  NoopProgressReporter,
  formatProgressLine,
  resolveProgressReporter,
} from "./progress.js";

function makeStream(isTTY: boolean): { isTTY: boolean; chunks: string[]; write: (chunk: string) => boolean } {
  const chunks: string[] = [];
  return {
    isTTY,
    chunks,
    write: (chunk: string) => {
      chunks.push(chunk);
      return true;
    },
  };
}

function outcome(index: number, status: BatchOutcome["status"]): BatchOutcome {
  return { index, archiveName: `archive_${index}.7z`, status, durationMs: 0 };
}

describe("formatProgressLine", () => {
  it("shows completed, total and percentage", () => {
    expect(formatProgressLine(1, 4, 0)).toBe("Compressing batches: 1/4 (25%)");
  });

  it("appends the failure count when there are failures", () => {
    expect(formatProgressLine(2, 3, 1)).toBe("Compressing batches: 2/3 (66%), 1 failed");
  });
});

describe("ConsoleProgressReporter", () => {
  it("rewrites one line per update and ends it on stop", () => {
    const stream = makeStream(true);
    const reporter = new ConsoleProgressReporter(stream);

    reporter.start(2);
    reporter.advance(outcome(1, "done"));
    reporter.advance(outcome(2, "failed"));
    reporter.stop();

    expect(stream.chunks).toEqual([
      "\rCompressing batches: 0/2 (0%)",
      "\rCompressing batches: 1/2 (50%)",
      "\rCompressing batches: 2/2 (100%), 1 failed",
      "\n",
    ]);
  });
});

describe("resolveProgressReporter", () => {
  it("uses the console reporter on a terminal", () => {
    expect(resolveProgressReporter({ stream: makeStream(true), verbose: false })).toBeInstanceOf(
      ConsoleProgressReporter,
    );
  });

  it("falls back to the no-op reporter when piped or verbose", () => {
    expect(resolveProgressReporter({ stream: makeStream(false), verbose: false })).toBeInstanceOf(
      NoopProgressReporter,
    );
    expect(resolveProgressReporter({ stream: makeStream(true), verbose: true })).toBeInstanceOf(
      NoopProgressReporter,
    );
  });
});
