import path from "node:path";

import type { Batch } from "../../core/batch-planner.js";
import { writeJsonFile } from "../../core/utils.js";

import type { BatchOutcome } from "./outcomes.js";

// =============================================================================
// TYPES
// =============================================================================

export type ArchiveRecord = {
  batch_num: number;
  archive_name: string;
  file_count: number;
  input_size: number;
  output_size: number;
  files: string[];
};

export type RunReport = {
  created_at: string;
  input_folder: string;
  output_folder: string;
  total_files: number;
  total_input_size: number;
  batch_size: number;
  compression_level: number;
  archives: ArchiveRecord[];
  total_output_size: number;
  compression_ratio: number;
};

export type RunReportHeader = {
  inputFolder: string;
  outputFolder: string;
  totalFiles: number;
  totalInputSize: number;
  batchSize: number;
  compressionLevel: number;
};

// =============================================================================
// BUILDER
// =============================================================================

/**
 * Accumulates batch outcomes into counters and archive records.
 * Only the orchestrator's drain loop writes to it.
 */
export class RunReportBuilder {
  private readonly archives: ArchiveRecord[] = [];
  private succeededCount = 0;
  private failedCount = 0;
  private outputTotal = 0;

  constructor(private readonly header: RunReportHeader) {}

  get succeeded(): number {
    return this.succeededCount;
  }

  get failed(): number {
    return this.failedCount;
  }

  get totalOutputSize(): number {
    return this.outputTotal;
  }

  recordOutcome(batch: Batch, outcome: BatchOutcome): void {
    if (outcome.status === "failed") {
      this.failedCount += 1;
      return;
    }
    if (outcome.status !== "done") return;

    const outputSize = outcome.archiveSize ?? 0;
    this.succeededCount += 1;
    this.outputTotal += outputSize;
    this.archives.push({
      batch_num: batch.index,
      archive_name: batch.archiveName,
      file_count: batch.files.length,
      input_size: batch.inputSize,
      output_size: outputSize,
      files: batch.files.map((file) => path.posix.basename(file.relativePath)),
    });
  }

  compressionRatio(): number {
    return computeCompressionRatio(this.header.totalInputSize, this.outputTotal);
  }

  toJSON(createdAt: string): RunReport {
    return {
      created_at: createdAt,
      input_folder: this.header.inputFolder,
      output_folder: this.header.outputFolder,
      total_files: this.header.totalFiles,
      total_input_size: this.header.totalInputSize,
      batch_size: this.header.batchSize,
      compression_level: this.header.compressionLevel,
      archives: [...this.archives].sort((a, b) => a.batch_num - b.batch_num),
      total_output_size: this.outputTotal,
      compression_ratio: this.compressionRatio(),
    };
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Percentage of input bytes saved; 0 when there was no input.
 */
export function computeCompressionRatio(totalInputSize: number, totalOutputSize: number): number {
  if (totalInputSize === 0) return 0;
  return (1 - totalOutputSize / totalInputSize) * 100;
}

export async function writeRunReport(reportPath: string, report: RunReport): Promise<void> {
  await writeJsonFile(reportPath, report);
}
