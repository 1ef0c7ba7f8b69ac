/**
 * Progress reporters for batch runs.
 * Purpose: show a single live progress line on a terminal, nothing elsewhere.
 * Assumptions: resolved once at startup; the orchestrator only sees ProgressReporter.
 * Usage: const progress = resolveProgressReporter({ stream: process.stderr, verbose });
 */

import type { BatchOutcome } from "./outcomes.js";
import type { ProgressReporter } from "./ports.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProgressStream = {
  isTTY?: boolean;
  write(chunk: string): unknown;
};

// =============================================================================
// REPORTERS
// =============================================================================

export class NoopProgressReporter implements ProgressReporter {
  start(): void {}

  advance(): void {}

  stop(): void {}
}

export class ConsoleProgressReporter implements ProgressReporter {
  private total = 0;
  private completed = 0;
  private failed = 0;
  private active = false;

  constructor(private readonly stream: ProgressStream) {}

  start(total: number): void {
    this.total = total;
    this.completed = 0;
    this.failed = 0;
    this.active = true;
    this.render();
  }

  advance(outcome: BatchOutcome): void {
    if (!this.active) return;
    this.completed += 1;
    if (outcome.status === "failed") this.failed += 1;
    this.render();
  }

  stop(): void {
    if (!this.active) return;
    this.active = false;
    this.stream.write("\n");
  }

  private render(): void {
    this.stream.write(`\r${formatProgressLine(this.completed, this.total, this.failed)}`);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function formatProgressLine(completed: number, total: number, failed: number): string {
  const percent = total === 0 ? 100 : Math.floor((completed / total) * 100);
  const failedSuffix = failed > 0 ? `, ${failed} failed` : "";
  return `Compressing batches: ${completed}/${total} (${percent}%)${failedSuffix}`;
}

export function resolveProgressReporter(options: {
  stream: ProgressStream;
  verbose: boolean;
}): ProgressReporter {
  if (options.stream.isTTY && !options.verbose) {
    return new ConsoleProgressReporter(options.stream);
  }
  return new NoopProgressReporter();
}
