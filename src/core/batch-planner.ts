import path from "node:path";

import type { ArchiveExtension } from "./config.js";
import { ValidationError } from "./errors.js";
import { totalSize, type FileEntry } from "./file-catalog.js";
import { pathExists } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type Batch = {
  readonly index: number;
  readonly files: readonly FileEntry[];
  readonly archivePath: string;
  readonly archiveName: string;
  readonly inputSize: number;
};

export type BatchPlanOptions = {
  batchSize: number;
  outputDir: string;
  prefix: string;
  extension: ArchiveExtension;
  overwrite: boolean;
  splitVolumes?: boolean;
};

export type BatchPlan = {
  totalBatches: number;
  batches: Batch[];
  skipped: Batch[];
};

// =============================================================================
// PLANNING
// =============================================================================

/**
 * Contiguous partition: batch k holds entries [(k-1)*B, k*B) of the sorted catalog.
 */
export function partitionEntries(
  entries: readonly FileEntry[],
  options: Pick<BatchPlanOptions, "batchSize" | "outputDir" | "prefix" | "extension">,
): Batch[] {
  assertBatchSize(options.batchSize);

  const batches: Batch[] = [];
  for (let offset = 0; offset < entries.length; offset += options.batchSize) {
    const index = offset / options.batchSize + 1;
    const files = entries.slice(offset, offset + options.batchSize);
    const archiveName = archiveFileName(options.prefix, index, options.extension);

    batches.push({
      index,
      files,
      archivePath: path.join(options.outputDir, archiveName),
      archiveName,
      inputSize: totalSize(files),
    });
  }

  return batches;
}

export async function planBatches(
  entries: readonly FileEntry[],
  options: BatchPlanOptions,
): Promise<BatchPlan> {
  const all = partitionEntries(entries, options);
  const batches: Batch[] = [];
  const skipped: Batch[] = [];

  for (const batch of all) {
    if (!options.overwrite && (await archiveExists(batch.archivePath, options.splitVolumes))) {
      skipped.push(batch);
    } else {
      batches.push(batch);
    }
  }

  return { totalBatches: all.length, batches, skipped };
}

export function archiveFileName(prefix: string, index: number, extension: ArchiveExtension): string {
  return `${prefix}_${index}.${extension}`;
}

export function firstVolumePath(archivePath: string): string {
  return `${archivePath}.001`;
}

// =============================================================================
// INTERNALS
// =============================================================================

async function archiveExists(archivePath: string, splitVolumes = false): Promise<boolean> {
  if (await pathExists(archivePath)) return true;
  return splitVolumes ? pathExists(firstVolumePath(archivePath)) : false;
}

function assertBatchSize(batchSize: number): void {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ValidationError(`batch size must be an integer of at least 1 (received ${batchSize})`);
  }
}
